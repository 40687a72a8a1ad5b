import { buildProgramArgs } from '@zcl/codec'
import { generateChainData } from '@zcl/consensus'
import { logger } from '@zcl/core'
import {
  type HexArg,
  type SafePromise,
  safeError,
  safeResult,
} from '@zcl/types'
import { Command } from 'commander'
import type { CliEnv } from '../env'
import {
  loadHeaderSource,
  resolveOutputPath,
  writeJsonFile,
} from '../utils/files'
import { parseBlockNumber, parseFilePath } from '../utils/validation'

export interface ArgsOptions {
  height: number
  numBlocks: number
  headers?: string
  output?: string
}

export function createArgsCommand(env: CliEnv): Command {
  return new Command('args')
    .description(
      'Generate chain data and emit it directly as hex program arguments',
    )
    .requiredOption(
      '--height <number>',
      'Height of the initial chain state',
      parseBlockNumber,
    )
    .requiredOption(
      '--num-blocks <number>',
      'Number of blocks to apply',
      parseBlockNumber,
    )
    .option(
      '--headers <file>',
      'JSON array of header records',
      parseFilePath,
      env.ZCL_HEADERS_FILE,
    )
    .option(
      '--output <file>',
      'Write arguments to a file instead of stdout',
      parseFilePath,
    )
    .action(async (options: ArgsOptions) => {
      const [error, args] = await executeArgs(options)
      if (error) {
        logger.error('Failed to build program arguments:', error)
        process.exit(1)
      }
      if (!options.output) {
        process.stdout.write(`${JSON.stringify(args)}\n`)
        return
      }
      const path = resolveOutputPath(env.ZCL_OUTPUT_DIR, options.output)
      const [writeError] = await writeJsonFile(path, args)
      if (writeError) {
        logger.error('Failed to write program arguments:', writeError)
        process.exit(1)
      }
      logger.info(`Program arguments written to ${path}`)
    })
}

export async function executeArgs(options: ArgsOptions): SafePromise<HexArg[]> {
  if (!options.headers) {
    return safeError(
      new Error('No header file: pass --headers or set ZCL_HEADERS_FILE'),
    )
  }
  const [sourceError, source] = await loadHeaderSource(options.headers)
  if (sourceError) {
    return safeError(sourceError)
  }
  const [dataError, data] = await generateChainData(
    source,
    options.height,
    options.numBlocks,
  )
  if (dataError) {
    return safeError(dataError)
  }
  const [argsError, args] = buildProgramArgs(data)
  if (argsError) {
    return safeError(argsError)
  }
  return safeResult(args)
}
