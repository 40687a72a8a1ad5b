/**
 * Option parsers for CLI arguments
 */

import { InvalidArgumentError } from 'commander'

/**
 * Parses a block height or count: a non-negative safe integer in decimal
 */
export function parseBlockNumber(value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  const parsed = Number.parseInt(value, 10)
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a safe integer.')
  }
  return parsed
}

/**
 * Validates if a string is a usable file path
 */
export function isValidPath(path: string): boolean {
  return path.length > 0 && !/[<>"|?*]/.test(path)
}

export function parseFilePath(value: string): string {
  if (!isValidPath(value)) {
    throw new InvalidArgumentError('Must be a file path.')
  }
  return value
}
