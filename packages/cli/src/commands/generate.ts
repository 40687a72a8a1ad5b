import { chainDataToJson, generateChainData } from '@zcl/consensus'
import { logger } from '@zcl/core'
import { type SafePromise, safeError } from '@zcl/types'
import { Command } from 'commander'
import type { CliEnv } from '../env'
import {
  loadHeaderSource,
  resolveOutputPath,
  writeJsonFile,
} from '../utils/files'
import { parseBlockNumber, parseFilePath } from '../utils/validation'

export interface GenerateOptions {
  height: number
  numBlocks: number
  headers?: string
  output: string
}

export function createGenerateCommand(env: CliEnv): Command {
  return new Command('generate')
    .description(
      'Generate the chain state at a height and the blocks that follow it',
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
    .requiredOption(
      '--output <file>',
      'Chain data output file',
      parseFilePath,
    )
    .action(async (options: GenerateOptions) => {
      const [error, path] = await executeGenerate(options, env)
      if (error) {
        logger.error('Failed to generate chain data:', error)
        process.exit(1)
      }
      logger.info(`Chain data written to ${path}`)
    })
}

export async function executeGenerate(
  options: GenerateOptions,
  env: CliEnv,
): SafePromise<string> {
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
  return writeJsonFile(
    resolveOutputPath(env.ZCL_OUTPUT_DIR, options.output),
    chainDataToJson(data),
  )
}
