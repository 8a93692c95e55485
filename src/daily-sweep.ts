import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { SchedulerService } from './scheduler/scheduler.service'

/**
 * One-shot entry point for the external timer: run the sweep, exit.
 * SIGTERM stops it between users.
 */
async function main() {
  const logger = new Logger('DailySweep')
  const app = await NestFactory.createApplicationContext(AppModule)
  const controller = new AbortController()
  const stop = () => controller.abort()
  process.once('SIGTERM', stop)
  process.once('SIGINT', stop)

  try {
    const asOf = process.argv[2] ? new Date(process.argv[2]) : undefined
    if (asOf && Number.isNaN(asOf.getTime())) throw new Error(`Invalid date argument: ${process.argv[2]}`)
    const summary = await app.get(SchedulerService).runDailySweep(asOf, { signal: controller.signal })
    if (summary.failures.length > 0) {
      logger.warn(`${summary.failures.length} users failed and will be retried on the next run`)
      process.exitCode = 2
    }
  } finally {
    process.off('SIGTERM', stop)
    process.off('SIGINT', stop)
    await app.close()
  }
}

main().catch((err: unknown) => {
  new Logger('DailySweep').error(err instanceof Error ? (err.stack ?? err.message) : String(err))
  process.exitCode = 1
})
