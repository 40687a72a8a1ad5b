/**
 * Hex helpers shared by the consensus and codec packages
 */

import {
  ConversionError,
  ConversionErrorKind,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'
import { bytesToBigInt, bytesToHex, hexToBytes } from 'viem'

const HEX_BODY = /^[0-9a-fA-F]*$/

/**
 * Remove a leading `0x` / `0X`
 */
export function stripHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X')
    ? value.slice(2)
    : value
}

/**
 * Lowercase hex without prefix
 */
export function normalizeHex(value: string): string {
  return stripHexPrefix(value).toLowerCase()
}

/**
 * True for an even-length run of hex digits without prefix
 */
export function isHexBody(value: string): boolean {
  return value.length % 2 === 0 && HEX_BODY.test(value)
}

/**
 * Parse hex (prefix optional) into bytes
 */
export function parseHexBytes(value: string): Safe<Uint8Array> {
  const body = stripHexPrefix(value)
  if (!isHexBody(body)) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.UNSUPPORTED_STRING_SHAPE,
        `Invalid hex string: ${value}`,
        { value },
      ),
    )
  }
  return safeResult(hexToBytes(`0x${body}`))
}

/**
 * Big-endian unsigned integer of a byte string; zero for no bytes
 */
export function bytesToUint(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    return 0n
  }
  return bytesToBigInt(bytes)
}

/**
 * Display-order hex without prefix
 */
export function toHexBody(bytes: Uint8Array): string {
  return bytesToHex(bytes).slice(2)
}
