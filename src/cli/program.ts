import { readFileSync } from 'fs'
import { Command } from 'commander'
import { loadDotenv } from '../config/environment'
import { loadModuleArgs, parseModuleArgs } from '../config/loader'
import { errorMessage } from '../errors'
import { createLogger, type Logger } from '../observability'
import { isModuleFailure, runModule, type ModuleDependencies, type ModuleOutput } from '../module/run'

export interface CliOptions {
  check: boolean
  logLevel: string
  pretty: boolean
  envFile?: string
}

export interface CliIO {
  readStdin(): string
  writeStdout(text: string): void
  setExitCode(code: number): void
  createLogger(options: { level: string; pretty: boolean }): Logger
  run(params: Record<string, unknown>, deps: ModuleDependencies): Promise<ModuleOutput>
}

export const processIO: CliIO = {
  readStdin: () => readFileSync(0, 'utf-8'),
  writeStdout: text => {
    process.stdout.write(text)
  },
  setExitCode: code => {
    process.exitCode = code
  },
  createLogger: options => createLogger(options),
  run: runModule,
}

export function createProgram(io: CliIO = processIO): Command {
  return new Command()
    .name('keyvault-secret')
    .description('Ensure a secret is present in, or absent from, an Azure Key Vault')
    .version('0.1.0')
    .argument('[args-file]', 'JSON or YAML file with module arguments (reads stdin when omitted)')
    .option('--check', 'report what would change without writing', false)
    .option('--log-level <level>', 'log level written to stderr', 'warn')
    .option('--pretty', 'human readable logs', false)
    .option('--env-file <path>', 'load environment variables from this file')
    .action(async (argsFile: string | undefined, opts: CliOptions) => {
      const logger = io.createLogger({ level: opts.logLevel, pretty: opts.pretty })

      let params: Record<string, unknown>
      try {
        loadDotenv(opts.envFile)
        params = argsFile ? loadModuleArgs(argsFile) : parseModuleArgs(io.readStdin(), 'stdin')
      } catch (error) {
        const output: ModuleOutput = { failed: true, changed: false, msg: errorMessage(error), error: 'VALIDATION_ERROR' }
        io.writeStdout(`${JSON.stringify(output)}\n`)
        io.setExitCode(1)
        return
      }

      if (opts.check) {
        params.check_mode = true
      }

      const output = await io.run(params, { logger })
      io.writeStdout(`${JSON.stringify(output)}\n`)
      io.setExitCode(isModuleFailure(output) ? 1 : 0)
    })
}
