#!/usr/bin/env tsx
import 'dotenv/config'
import {
  AuditCancelledError,
  ConfigError,
  createLogger,
  getErrorMessage,
  runAudit,
} from '@site-auditor/audit-engine'
import {
  EXIT_CANCELLED,
  EXIT_FAILED,
  createProgram,
  exitCodeFor,
  resolveCliConfig,
} from './options'
import type { CliFlags } from './options'

const logger = createLogger('CLI')
const program = createProgram()

program.action(async (url: string | undefined) => {
  const flags = program.opts<CliFlags>()

  let resolved: ReturnType<typeof resolveCliConfig>
  try {
    resolved = resolveCliConfig(url, flags)
  } catch (error) {
    console.error('\n❌ Configuración inválida:')
    console.error(getErrorMessage(error))
    if (!(error instanceof ConfigError)) throw error
    process.exitCode = EXIT_FAILED
    return
  }
  const { config, failOn } = resolved

  const controller = new AbortController()
  process.once('SIGINT', () => {
    logger.warn('SIGINT recibido: cancelando la auditoría...')
    controller.abort()
  })

  console.log(`🚀 Iniciando auditoría ${config.reportType} de ${config.targetUrl}`)
  try {
    const outcome = await runAudit(config, { signal: controller.signal })

    console.log('\n--- Resumen ---')
    console.log(outcome.preview)
    if (outcome.location) {
      console.log(`\n📁 Reporte guardado en: ${outcome.location}`)
    } else {
      console.error(`\n❌ La auditoría falló: ${outcome.run.error ?? 'sin detalle'}`)
    }
    process.exitCode = exitCodeFor(outcome, failOn)
  } catch (error) {
    if (error instanceof AuditCancelledError) {
      console.error('\n⏹  Auditoría cancelada, no se guardó ningún reporte.')
      process.exitCode = EXIT_CANCELLED
      return
    }
    console.error('\n❌ Error inesperado ejecutando la auditoría:')
    console.error(getErrorMessage(error))
    process.exitCode = EXIT_FAILED
  }
})

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(getErrorMessage(error))
  process.exitCode = EXIT_FAILED
})
