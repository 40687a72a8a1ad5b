/**
 * Field value serialization
 *
 * Maps a tagged value tree onto the circuit's data layout:
 *
 *   bool          → scalar 1 | 0
 *   felt          → scalar, 0 ≤ x < 2^252
 *   u256          → (lo, hi) 128-bit halves, 0 ≤ x < 2^256
 *   digest        → eight u32 words of the byte-reversed hash
 *   byteArray     → (chunk count, 31-byte chunks…, remainder, remainder length)
 *   array         → (length, items…)
 *   record        → (fields…), inline fields spliced
 *   option        → none: 1, some: (0, value)
 *   nested        → list kept as a nested list
 */

import { bytesToUint, normalizeHex } from '@zcl/core'
import {
  ConversionError,
  ConversionErrorKind,
  type FieldValue,
  type Safe,
  type SerializedValue,
  safeError,
  safeResult,
} from '@zcl/types'
import { hexToBytes } from 'viem'

export const FELT_BOUND = 1n << 252n
export const U256_BOUND = 1n << 256n
const U128_MASK = (1n << 128n) - 1n

/** Bytes per byte-array limb */
export const BYTES31_LENGTH = 31

const DIGEST_HEX = /^[0-9a-f]{64}$/
const ZERO_DIGEST = '0'.repeat(64)

function outOfRange(value: bigint, bound: bigint) {
  return safeError(
    new ConversionError(
      ConversionErrorKind.OUT_OF_RANGE_SCALAR,
      `Value ${value} outside [0, ${bound})`,
      { value: value.toString() },
    ),
  )
}

function scalar(value: bigint): SerializedValue {
  return { kind: 'scalar', value }
}

function done(value: SerializedValue): Safe<SerializedValue> {
  return safeResult(value)
}

/**
 * Eight big-endian u32 words of the reversed byte sequence
 */
export function serializeDigest(hex: string): Safe<SerializedValue> {
  const body = normalizeHex(hex)
  if (!DIGEST_HEX.test(body)) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.UNSUPPORTED_STRING_SHAPE,
        `Digest must be 64 hex characters: ${hex}`,
        { value: hex },
      ),
    )
  }
  if (body === ZERO_DIGEST) {
    return done({
      kind: 'digest',
      words: Array.from({ length: 8 }, () => 0n),
    })
  }

  const reversed = hexToBytes(`0x${body}`).reverse()
  const words: bigint[] = []
  for (let i = 0; i < 32; i += 4) {
    words.push(bytesToUint(reversed.subarray(i, i + 4)))
  }
  return done({ kind: 'digest', words })
}

/**
 * 31-byte big-endian chunks from the front. The tail is a 31-byte word
 * right-justified with leading zero bytes (its own big-endian value), carried
 * with its true length.
 */
export function serializeByteArray(bytes: Uint8Array): SerializedValue {
  const chunkCount = Math.floor(bytes.length / BYTES31_LENGTH)
  const mainLength = chunkCount * BYTES31_LENGTH
  const chunks: bigint[] = []
  for (let offset = 0; offset < mainLength; offset += BYTES31_LENGTH) {
    chunks.push(bytesToUint(bytes.subarray(offset, offset + BYTES31_LENGTH)))
  }

  const tail = bytes.subarray(mainLength)

  return {
    kind: 'byteChunks',
    chunkCount,
    chunks,
    remainder: bytesToUint(tail),
    remainderLength: tail.length,
  }
}

function serializeAll(values: readonly FieldValue[]): Safe<SerializedValue[]> {
  const out: SerializedValue[] = []
  for (const value of values) {
    const [error, serialized] = serialize(value)
    if (error) {
      return safeError(error)
    }
    out.push(serialized)
  }
  return safeResult(out)
}

export function serialize(value: FieldValue): Safe<SerializedValue> {
  switch (value.kind) {
    case 'bool':
      return done(scalar(value.value ? 1n : 0n))

    case 'felt':
      if (value.value < 0n || value.value >= FELT_BOUND) {
        return outOfRange(value.value, FELT_BOUND)
      }
      return done(scalar(value.value))

    case 'u256':
      if (value.value < 0n || value.value >= U256_BOUND) {
        return outOfRange(value.value, U256_BOUND)
      }
      return done({
        kind: 'wideInt',
        lo: value.value & U128_MASK,
        hi: value.value >> 128n,
      })

    case 'digest':
      return serializeDigest(value.hex)

    case 'byteArray':
      return done(serializeByteArray(value.bytes))

    case 'array': {
      const [error, elements] = serializeAll(value.items)
      if (error) {
        return safeError(error)
      }
      return done({ kind: 'sequence', length: elements.length, elements })
    }

    case 'record': {
      const elements: SerializedValue[] = []
      for (const entry of value.entries) {
        const [error, serialized] = entry.inline
          ? serializeAll(entry.values)
          : serializeAll([entry.value])
        if (error) {
          return safeError(error)
        }
        elements.push(...serialized)
      }
      return done({ kind: 'tuple', elements })
    }

    case 'option': {
      if (value.value === undefined) {
        return done(scalar(1n))
      }
      const [error, inner] = serialize(value.value)
      if (error) {
        return safeError(error)
      }
      return done({ kind: 'tuple', elements: [scalar(0n), inner] })
    }

    case 'nested': {
      const [error, elements] = serializeAll(value.items)
      if (error) {
        return safeError(error)
      }
      return done({ kind: 'nested', elements })
    }
  }
}
