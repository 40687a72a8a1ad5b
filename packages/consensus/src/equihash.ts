/**
 * Equihash solution codec
 *
 * A minimal-encoded solution packs 2^k indices of (n/(k+1) + 1) bits each
 * into one big-endian bitstream: bit 0 of the stream is the most significant
 * bit of byte 0. For mainnet (n = 200, k = 9) that is 512 indices of 21 bits
 * in 1344 bytes.
 */

import { parseHexBytes } from '@zcl/core'
import {
  ConversionError,
  ConversionErrorKind,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'

export interface EquihashParams {
  readonly n: number
  readonly k: number
}

export const MAINNET_EQUIHASH: EquihashParams = Object.freeze({ n: 200, k: 9 })

export interface EquihashLayout {
  collisionBitLength: number
  bitsPerIndex: number
  numIndices: number
  solutionByteLength: number
}

export function equihashLayout(
  params: EquihashParams = MAINNET_EQUIHASH,
): EquihashLayout {
  const collisionBitLength = params.n / (params.k + 1)
  const bitsPerIndex = collisionBitLength + 1
  const numIndices = 2 ** params.k
  return {
    collisionBitLength,
    bitsPerIndex,
    numIndices,
    solutionByteLength: Math.ceil((numIndices * bitsPerIndex) / 8),
  }
}

/**
 * Unpack solution bytes into indices.
 *
 * An empty input yields no indices (header-only records carry no solution);
 * any other length must match the layout exactly.
 */
export function decodeSolution(
  bytes: Uint8Array,
  params: EquihashParams = MAINNET_EQUIHASH,
): Safe<number[]> {
  if (bytes.length === 0) {
    return safeResult([])
  }

  const { bitsPerIndex, numIndices, solutionByteLength } =
    equihashLayout(params)
  if (bytes.length !== solutionByteLength) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.INVALID_SOLUTION_LENGTH,
        `Equihash solution must be ${solutionByteLength} bytes, got ${bytes.length}`,
        { expected: solutionByteLength, actual: bytes.length },
      ),
    )
  }

  const indices = new Array<number>(numIndices)
  let accumulator = 0
  let accumulatedBits = 0
  let byteIndex = 0
  const mask = 2 ** bitsPerIndex - 1

  for (let i = 0; i < numIndices; i++) {
    while (accumulatedBits < bitsPerIndex) {
      accumulator = ((accumulator << 8) | bytes[byteIndex]) >>> 0
      byteIndex++
      accumulatedBits += 8
    }
    accumulatedBits -= bitsPerIndex
    indices[i] = (accumulator >>> accumulatedBits) & mask
    // keep only the bits not yet consumed
    accumulator &= 2 ** accumulatedBits - 1
  }

  return safeResult(indices)
}

/**
 * Unpack a hex-encoded solution (optional `0x`, any case)
 */
export function parseSolutionHex(
  hex: string,
  params: EquihashParams = MAINNET_EQUIHASH,
): Safe<number[]> {
  const [hexError, bytes] = parseHexBytes(hex)
  if (hexError) {
    return safeError(hexError)
  }
  return decodeSolution(bytes, params)
}

/**
 * Pack indices back into the minimal encoding
 */
export function encodeSolution(
  indices: readonly number[],
  params: EquihashParams = MAINNET_EQUIHASH,
): Safe<Uint8Array> {
  const { bitsPerIndex, numIndices, solutionByteLength } =
    equihashLayout(params)
  if (indices.length !== numIndices) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.INVALID_SOLUTION_LENGTH,
        `Equihash solution must have ${numIndices} indices, got ${indices.length}`,
      ),
    )
  }

  const limit = 2 ** bitsPerIndex
  const out = new Uint8Array(solutionByteLength)
  let bitOffset = 0

  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= limit) {
      return safeError(
        new ConversionError(
          ConversionErrorKind.OUT_OF_RANGE_SCALAR,
          `Equihash index ${index} does not fit in ${bitsPerIndex} bits`,
        ),
      )
    }
    for (let b = bitsPerIndex - 1; b >= 0; b--) {
      if ((index >>> b) & 1) {
        out[bitOffset >> 3] |= 0x80 >> (bitOffset & 7)
      }
      bitOffset++
    }
  }

  return safeResult(out)
}
