import { readFile, writeFile } from 'node:fs/promises'
import { isAbsolute, join } from 'node:path'
import { MemoryHeaderSource } from '@zcl/consensus'
import {
  ConversionError,
  ConversionErrorKind,
  type SafePromise,
  safeCall,
  safeError,
  safeResult,
  safeTry,
} from '@zcl/types'

export async function readJsonFile(path: string): SafePromise<unknown> {
  const [readError, text] = await safeTry(readFile(path, 'utf-8'))
  if (readError) {
    return safeError(readError)
  }
  const [parseError, json] = safeCall((): unknown => JSON.parse(text))
  if (parseError) {
    return safeError(
      new Error(`Invalid JSON in ${path}: ${parseError.message}`),
    )
  }
  return safeResult(json)
}

export async function writeJsonFile(
  path: string,
  value: unknown,
): SafePromise<string> {
  const [error] = await safeTry(
    writeFile(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8'),
  )
  if (error) {
    return safeError(error)
  }
  return safeResult(path)
}

/**
 * Load a JSON array of header records into an in-memory header source
 */
export async function loadHeaderSource(
  path: string,
): SafePromise<MemoryHeaderSource> {
  const [error, json] = await readJsonFile(path)
  if (error) {
    return safeError(error)
  }
  if (!Array.isArray(json)) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.INVALID_HEADER_RECORD,
        `Header file must hold a JSON array: ${path}`,
      ),
    )
  }
  return MemoryHeaderSource.fromRecords(json)
}

export function resolveOutputPath(outputDir: string, path: string): string {
  return isAbsolute(path) ? path : join(outputDir, path)
}
