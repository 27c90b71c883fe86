import express from 'express'
import type { Express } from 'express'
import { randomUUID } from 'crypto'
import {
  ConfigError,
  createLogger,
  getErrorMessage,
  parseConfigInput,
  resolveAuditConfig,
} from '@site-auditor/audit-engine'
import type { AuditLogger } from '@site-auditor/audit-engine'
import type { AuditConfig } from '@site-auditor/shared-types'
import type { AuditQueue, AuditStore } from './types'

export interface AppDependencies {
  queue: AuditQueue
  store: AuditStore
  logger?: AuditLogger
  env?: NodeJS.ProcessEnv
  newId?: () => string
}

export function createApp(deps: AppDependencies): Express {
  const { queue, store } = deps
  const logger = deps.logger ?? createLogger('API')
  const newId = deps.newId ?? randomUUID
  const app = express()

  app.use(express.json())

  app.get('/', (_req, res) => {
    res.send('Site Auditor Backend API')
  })

  // Encola una auditoría (llamado por el CLI o una UI)
  app.post('/audits', async (req, res) => {
    let config: AuditConfig
    try {
      config = resolveAuditConfig(parseConfigInput(req.body), deps.env)
    } catch (error) {
      if (error instanceof ConfigError) {
        res.status(400).send({ error: error.message, ...error.context })
      } else {
        logger.error(`Error validando la auditoría: ${getErrorMessage(error)}`)
        res.status(500).send({ error: 'Error interno al validar la auditoría' })
      }
      return
    }

    const id = newId()
    try {
      await store.create({
        id,
        targetUrl: config.targetUrl,
        reportType: config.reportType,
      })
      await queue.enqueue({ id, config })
      logger.info(`Auditoría ${id} encolada para ${config.targetUrl}`)
      res.status(202).send({ message: 'Auditoría encolada', id })
    } catch (error) {
      logger.error(`Error al encolar auditoría: ${getErrorMessage(error)}`)
      await store
        .update(id, { status: 'failed', error: 'No se pudo encolar la auditoría' })
        .catch((updateError: unknown) =>
          logger.error(`No se pudo marcar ${id} como fallida: ${getErrorMessage(updateError)}`)
        )
      res.status(500).send({ error: 'Error interno al encolar la auditoría' })
    }
  })

  app.get('/audits/:id', async (req, res) => {
    try {
      const record = await store.get(req.params.id)
      if (!record) {
        res.status(404).send({ message: 'Auditoría no encontrada' })
        return
      }
      res.status(200).send(record)
    } catch (error) {
      logger.error(`Error al obtener auditoría: ${getErrorMessage(error)}`)
      res.status(500).send({ error: 'Error interno al obtener la auditoría' })
    }
  })

  return app
}
