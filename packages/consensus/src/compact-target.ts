/**
 * Compact target encoding
 *
 * The 4-byte "bits" field is a base-256 float: the top byte is an exponent
 * `e`, the low three bytes a mantissa `m`.
 *
 *   e == 0  → m
 *   e <= 3  → m >> 8·(3 − e)
 *   e >  3  → m << 8·(e − 3)
 *
 * Decoding is exact in both shift directions; the mantissa sign bit is not
 * interpreted.
 */

import { isHexBody, stripHexPrefix } from '@zcl/core'
import {
  ConversionError,
  ConversionErrorKind,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'
import { MAINNET_PARAMS } from './params'

const TWO_POW_256 = 1n << 256n

function invalidCompact(message: string, context?: Record<string, unknown>) {
  return safeError(
    new ConversionError(
      ConversionErrorKind.INVALID_COMPACT_ENCODING,
      message,
      context,
    ),
  )
}

function decodeCompact(exponent: number, mantissa: bigint): bigint {
  if (exponent === 0) {
    return mantissa
  }
  if (exponent <= 3) {
    return mantissa >> BigInt(8 * (3 - exponent))
  }
  return mantissa << BigInt(8 * (exponent - 3))
}

/**
 * Decode big-endian compact bits into a target
 */
export function bitsToTarget(bits: Uint8Array): Safe<bigint> {
  if (bits.length !== 4) {
    return invalidCompact(
      `Compact bits must be exactly 4 bytes, got ${bits.length}`,
      { length: bits.length },
    )
  }
  const mantissa =
    (BigInt(bits[1]) << 16n) | (BigInt(bits[2]) << 8n) | BigInt(bits[3])
  return safeResult(decodeCompact(bits[0], mantissa))
}

/**
 * Decode compact bits held as an unsigned 32-bit integer
 */
export function compactToTarget(bits: number): Safe<bigint> {
  if (!Number.isInteger(bits) || bits < 0 || bits > 0xffffffff) {
    return invalidCompact(`Compact bits must be a u32, got ${bits}`, { bits })
  }
  return safeResult(decodeCompact(bits >>> 24, BigInt(bits & 0xffffff)))
}

/**
 * Parse the textual form: 8 hex characters, any case, optional `0x`
 */
export function parseCompactBits(text: string): Safe<number> {
  const body = stripHexPrefix(text)
  if (body.length !== 8 || !isHexBody(body)) {
    return invalidCompact(`Compact bits must be 8 hex characters: ${text}`, {
      text,
    })
  }
  return safeResult(Number.parseInt(body, 16))
}

/**
 * Encode a target in compact form.
 *
 * The mantissa keeps the three most significant bytes; when its top bit
 * would be set the exponent grows by one so the mantissa stays below
 * 0x800000. Low-order bytes beyond the mantissa are dropped.
 */
export function targetToBits(target: bigint): Safe<number> {
  if (target < 0n || target >= TWO_POW_256) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.OUT_OF_RANGE_SCALAR,
        `Target must be in [0, 2^256): ${target}`,
      ),
    )
  }

  let size = byteLength(target)
  let mantissa =
    size <= 3
      ? target << BigInt(8 * (3 - size))
      : target >> BigInt(8 * (size - 3))

  if (mantissa & 0x800000n) {
    mantissa >>= 8n
    size += 1
  }

  return safeResult(size * 0x1000000 + Number(mantissa))
}

function byteLength(value: bigint): number {
  let size = 0
  let rest = value
  while (rest > 0n) {
    rest >>= 8n
    size += 1
  }
  return size
}

/**
 * Approximate work represented by a target: ⌊2^256 / (target + 1)⌋, zero for
 * a zero target.
 *
 * Summed into `totalWork` as an ordering signal only; it is not checked
 * against the node's chainwork.
 */
export function targetToWork(target: bigint): bigint {
  if (target === 0n) {
    return 0n
  }
  return TWO_POW_256 / (target + 1n)
}

/** Proof-of-work ceiling, decoded from 0x1d00ffff */
export const POW_LIMIT_TARGET: bigint = decodeCompact(
  MAINNET_PARAMS.powLimitBits >>> 24,
  BigInt(MAINNET_PARAMS.powLimitBits & 0xffffff),
)
