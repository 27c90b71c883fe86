import 'dotenv/config'
import { Queue, Worker } from 'bullmq'
import IORedis from 'ioredis'
import { Pool } from 'pg'
import { createLogger, getErrorMessage, toSafeInt } from '@site-auditor/audit-engine'
import { createApp } from './app'
import { PgAuditStore } from './store'
import type { AuditJobData, AuditQueue, AuditRecordStatus } from './types'
import { createAuditProcessor } from './worker'

const QUEUE_NAME = 'audit-jobs'

const logger = createLogger('Backend')
const port = toSafeInt(process.env.PORT, 3001, 1, 65535)

const redisConnection = new IORedis({
  host: process.env.REDIS_HOST || '127.0.0.1',
  port: toSafeInt(process.env.REDIS_PORT, 6379, 1, 65535),
  maxRetriesPerRequest: null, // Requerido por los workers de BullMQ
})

const pgPool = new Pool({
  host: process.env.DB_HOST || '127.0.0.1',
  port: toSafeInt(process.env.DB_PORT, 5432, 1, 65535),
  database: process.env.DB_NAME || 'site_audit_dev',
  user: process.env.DB_USER || 'user',
  password: process.env.DB_PASSWORD || 'password',
})

const store = new PgAuditStore(pgPool)

// Los datos del trabajo llevan credenciales: se borran de Redis al terminar
const auditQueue = new Queue<AuditJobData>(QUEUE_NAME, { connection: redisConnection })
const queue: AuditQueue = {
  async enqueue(job) {
    await auditQueue.add(`audit-${job.id}`, job, {
      jobId: job.id,
      removeOnComplete: true,
      removeOnFail: true,
    })
  },
}

const processAudit = createAuditProcessor({ store })
const running = new Map<string, AbortController>()

// En producción debería correr en un proceso separado
const auditWorker = new Worker<AuditJobData, AuditRecordStatus>(
  QUEUE_NAME,
  async (job) => {
    const controller = new AbortController()
    running.set(job.data.id, controller)
    try {
      return await processAudit(job.data, controller.signal)
    } finally {
      running.delete(job.data.id)
    }
  },
  {
    connection: redisConnection,
    concurrency: toSafeInt(process.env.WORKER_CONCURRENCY, 2, 1, 16),
  }
)

auditWorker.on('completed', (job, status) => {
  logger.info(`Job ${job.id} completado con estado ${status}`)
})

auditWorker.on('failed', (job, err) => {
  logger.error(`Job ${job?.id} falló con error ${err.message}`)
})

const app = createApp({ queue, store })

async function start(): Promise<void> {
  await store.ensureSchema()
  const server = app.listen(port, () => {
    logger.info(`Backend API escuchando en http://localhost:${port}`)
    logger.info('Worker esperando trabajos...')
  })

  process.once('SIGTERM', () => {
    logger.info('SIGTERM recibido: cerrando servidor HTTP y worker')
    for (const controller of running.values()) controller.abort()
    server.close()
    shutdown()
      .then(() => {
        logger.info('Limpieza completada')
        process.exit(0)
      })
      .catch((error: unknown) => {
        logger.error(`Error durante el cierre: ${getErrorMessage(error)}`)
        process.exit(1)
      })
  })
}

async function shutdown(): Promise<void> {
  await auditWorker.close()
  await auditQueue.close()
  await redisConnection.quit()
  await pgPool.end()
}

start().catch((error: unknown) => {
  logger.error(`No se pudo iniciar el backend: ${getErrorMessage(error)}`)
  process.exit(1)
})
