import {
  AuditCancelledError,
  createLogger,
  getErrorMessage,
  runAudit,
} from '@site-auditor/audit-engine'
import type { AuditLogger, RunAuditOptions } from '@site-auditor/audit-engine'
import type { AuditConfig, AuditOutcome } from '@site-auditor/shared-types'
import type { AuditJobData, AuditRecordStatus, AuditStore } from './types'

export interface ProcessorDependencies {
  store: AuditStore
  logger?: AuditLogger
  run?: (config: AuditConfig, options: RunAuditOptions) => Promise<AuditOutcome>
}

/**
 * Procesa un trabajo de la cola: ejecuta la auditoría y refleja el resultado
 * en el store. Los errores inesperados se guardan y se relanzan para que BullMQ
 * marque el trabajo como fallido.
 */
export function createAuditProcessor(deps: ProcessorDependencies) {
  const logger = deps.logger ?? createLogger('Worker')
  const run = deps.run ?? runAudit

  return async function processAudit(
    job: AuditJobData,
    signal?: AbortSignal
  ): Promise<AuditRecordStatus> {
    logger.info(`Procesando auditoría ${job.id} para target: ${job.config.targetUrl}`)
    await deps.store.update(job.id, { status: 'running' })

    try {
      const outcome = await run(job.config, { signal })
      await deps.store.update(job.id, {
        status: outcome.status,
        preview: outcome.preview,
        location: outcome.location ?? null,
        error: outcome.run.error ?? null,
      })
      logger.info(`Auditoría ${job.id} terminada con estado ${outcome.status}`)
      return outcome.status
    } catch (error) {
      if (error instanceof AuditCancelledError) {
        await deps.store.update(job.id, { status: 'cancelled', error: error.message })
        logger.warn(`Auditoría ${job.id} cancelada`)
        return 'cancelled'
      }
      const message = getErrorMessage(error)
      logger.error(`Auditoría ${job.id} falló: ${message}`)
      await deps.store.update(job.id, { status: 'failed', error: message })
      throw error
    }
  }
}
