import { formatUntypedArgs } from '@zcl/codec'
import { logger } from '@zcl/core'
import {
  type HexArg,
  type SafePromise,
  safeError,
  safeResult,
} from '@zcl/types'
import { Command } from 'commander'
import { readJsonFile } from '../utils/files'
import { parseFilePath } from '../utils/validation'

export function createFormatArgsCommand(): Command {
  return new Command('format-args')
    .description(
      'Convert an untyped JSON argument file to hex program arguments',
    )
    .requiredOption(
      '--input <file>',
      'Input file with arguments in JSON format',
      parseFilePath,
    )
    .action(async (options: { input: string }) => {
      const [error, args] = await executeFormatArgs(options.input)
      if (error) {
        logger.error('Failed to format arguments:', error)
        process.exit(1)
      }
      process.stdout.write(`${JSON.stringify(args)}\n`)
    })
}

export async function executeFormatArgs(input: string): SafePromise<HexArg[]> {
  const [readError, json] = await readJsonFile(input)
  if (readError) {
    return safeError(readError)
  }
  const [formatError, args] = formatUntypedArgs(json)
  if (formatError) {
    return safeError(formatError)
  }
  return safeResult(args)
}
