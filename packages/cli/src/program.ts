import { Command } from 'commander'
import { createArgsCommand } from './commands/args'
import { createFormatArgsCommand } from './commands/format-args'
import { createGenerateCommand } from './commands/generate'
import type { CliEnv } from './env'

export const CLI_VERSION = '0.1.0'

export function createProgram(env: CliEnv): Command {
  return new Command('zcl')
    .description('Prepare Zcash light-client program arguments')
    .version(CLI_VERSION)
    .addCommand(createGenerateCommand(env))
    .addCommand(createFormatArgsCommand())
    .addCommand(createArgsCommand(env))
}

export { createArgsCommand, executeArgs } from './commands/args'
export {
  createFormatArgsCommand,
  executeFormatArgs,
} from './commands/format-args'
export { createGenerateCommand, executeGenerate } from './commands/generate'
export { type CliEnv, cliEnvSchema, loadCliEnv } from './env'
