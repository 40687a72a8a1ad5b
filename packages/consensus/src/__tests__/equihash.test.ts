import { ConversionErrorKind, isConversionError } from '@zcl/types'
import { describe, expect, it } from 'vitest'
import {
  decodeSolution,
  encodeSolution,
  equihashLayout,
  MAINNET_EQUIHASH,
  parseSolutionHex,
} from '../equihash'

const SOLUTION_BYTES = 1344

describe('Equihash solution codec', () => {
  it('should derive the mainnet layout', () => {
    expect(equihashLayout(MAINNET_EQUIHASH)).toEqual({
      collisionBitLength: 20,
      bitsPerIndex: 21,
      numIndices: 512,
      solutionByteLength: SOLUTION_BYTES,
    })
  })

  it('should decode an all-zero solution to 512 zero indices', () => {
    const [error, indices] = decodeSolution(new Uint8Array(SOLUTION_BYTES))
    expect(error).toBeUndefined()
    expect(indices).toHaveLength(512)
    expect(indices?.every((index) => index === 0)).toBe(true)
  })

  it('should decode an empty solution to no indices', () => {
    expect(decodeSolution(new Uint8Array(0))).toEqual([undefined, []])
  })

  it('should reject any other length', () => {
    for (const length of [1, 1343, 1345, 2688]) {
      const [error] = decodeSolution(new Uint8Array(length))
      expect(
        isConversionError(error, ConversionErrorKind.INVALID_SOLUTION_LENGTH),
      ).toBe(true)
    }
  })

  it('should read the stream most significant bit first', () => {
    const bytes = new Uint8Array(SOLUTION_BYTES)
    bytes[0] = 0x80
    bytes[SOLUTION_BYTES - 1] = 0x01
    const [, indices] = decodeSolution(bytes)
    expect(indices?.[0]).toBe(1 << 20)
    expect(indices?.[1]).toBe(0)
    expect(indices?.[511]).toBe(1)
  })

  it('should split indices across byte boundaries', () => {
    // second index occupies stream bits 21..41
    const bytes = new Uint8Array(SOLUTION_BYTES)
    bytes[2] = 0x07
    bytes[3] = 0xff
    bytes[4] = 0xff
    bytes[5] = 0xc0
    const [, indices] = decodeSolution(bytes)
    expect(indices?.[0]).toBe(0)
    expect(indices?.[1]).toBe(2 ** 21 - 1)
    expect(indices?.[2]).toBe(0)
  })

  it('should be deterministic', () => {
    const bytes = new Uint8Array(SOLUTION_BYTES).map((_, i) => (i * 37) & 0xff)
    expect(decodeSolution(bytes)).toEqual(decodeSolution(bytes.slice()))
  })

  it('should pack indices back into the same bytes', () => {
    const indices = Array.from({ length: 512 }, (_, i) => (i * 4099) % 2 ** 21)
    const [encodeError, bytes] = encodeSolution(indices)
    if (encodeError) {
      throw encodeError
    }
    expect(bytes).toHaveLength(SOLUTION_BYTES)
    expect(decodeSolution(bytes)).toEqual([undefined, indices])
  })

  it('should reject a wrong index count or width when encoding', () => {
    const [countError] = encodeSolution(new Array<number>(511).fill(0))
    expect(
      isConversionError(countError, ConversionErrorKind.INVALID_SOLUTION_LENGTH),
    ).toBe(true)

    const wide = new Array<number>(512).fill(0)
    wide[3] = 2 ** 21
    const [widthError] = encodeSolution(wide)
    expect(
      isConversionError(widthError, ConversionErrorKind.OUT_OF_RANGE_SCALAR),
    ).toBe(true)
  })

  it('should parse hex solutions', () => {
    const [error, indices] = parseSolutionHex(`0x${'00'.repeat(SOLUTION_BYTES)}`)
    expect(error).toBeUndefined()
    expect(indices).toHaveLength(512)

    expect(parseSolutionHex('')).toEqual([undefined, []])

    const [hexError] = parseSolutionHex('zz')
    expect(
      isConversionError(hexError, ConversionErrorKind.UNSUPPORTED_STRING_SHAPE),
    ).toBe(true)
  })

  it('should support smaller parameter sets', () => {
    const params = { n: 48, k: 5 }
    expect(equihashLayout(params).solutionByteLength).toBe(36)
    const indices = Array.from({ length: 32 }, (_, i) => i * 15)
    const [, bytes] = encodeSolution(indices, params)
    if (bytes === undefined) {
      throw new Error('encoding failed')
    }
    expect(decodeSolution(bytes, params)).toEqual([undefined, indices])
  })
})
