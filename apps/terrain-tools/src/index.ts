import { config as loadEnv } from 'dotenv'
import { Command } from 'commander'
import { makeLogger } from '@terrakit/logger'
import { errorMessage } from '@terrakit/utils'
import { createApp } from './app.js'
import { loadConfig } from './config.js'

loadEnv()

const logger = makeLogger('terrain-tools')
const program = new Command()

function print(result: unknown): void {
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`)
}

function failed(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'success' in result && !result.success
}

program
  .name('terrain-tools')
  .description('Validate, repair and learn from terrain projects')
  .version('0.1.0')

// terrain-tools serve --port 8007
program
  .command('serve')
  .description('Start the HTTP tool server')
  .option('--port <port>', 'Port to listen on')
  .option('--host <host>', 'Interface to bind')
  .action(async (opts: { port?: string; host?: string }) => {
    const app = await createApp(
      loadConfig({
        ...process.env,
        ...(opts.port ? { PORT: opts.port } : {}),
        ...(opts.host ? { HOST: opts.host } : {}),
      }),
      logger,
    )
    await app.server.start()

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`)
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(err)}`)
          process.exit(1)
        },
      )
    }
    process.on('SIGINT', () => shutdown('SIGINT'))
    process.on('SIGTERM', () => shutdown('SIGTERM'))
  })

program
  .command('analyze <file>')
  .description('Print diagnostics and a health score for a project file')
  .action(async (file: string) => {
    const { service } = await createApp(loadConfig(), logger)
    const result = await service.analyzeProjectFile(file)
    print(result)
    if (failed(result)) process.exitCode = 1
  })

program
  .command('repair <file>')
  .description('Repair a project file in place')
  .option('--no-backup', 'Do not keep a .backup copy of the original')
  .action(async (file: string, opts: { backup: boolean }) => {
    const { service } = await createApp(loadConfig(), logger)
    const result = await service.repairProjectFile(file, { backup: opts.backup })
    print(result.success ? { ...result, backup_data: undefined } : result)
    if (failed(result)) process.exitCode = 1
  })

program
  .command('learn <directory>')
  .description('Learn node patterns from a directory and save them to PATTERN_DB_PATH')
  .action(async (directory: string) => {
    const app = await createApp(loadConfig(), logger)
    const result = await app.service.analyzeWorkflowPatterns(directory)
    if (result.success && app.config.PATTERN_DB_PATH) {
      await app.service.analyzer.saveAnalysis(app.config.PATTERN_DB_PATH)
      logger.info('pattern database saved', { path: app.config.PATTERN_DB_PATH })
    }
    print(result)
    if (failed(result)) process.exitCode = 1
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal(errorMessage(err))
  process.exit(1)
})
