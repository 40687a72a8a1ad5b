/**
 * Tuple flattening
 *
 * Serialized values are positional tuples nested inside each other. The
 * prover takes a flat list of scalars in which only `nested` values stay
 * nested:
 *
 *   (0, (1, 2), nested[(3, 4, nested[5, 6])]) → [0, 1, 2, [3, 4, [5, 6]]]
 */

import {
  type FieldValue,
  type FlatArg,
  type HexArg,
  type Safe,
  type SerializedValue,
  safeError,
  safeResult,
} from '@zcl/types'
import { numberToHex } from 'viem'
import { serialize } from './serialize'

function appendFlat(value: SerializedValue, to: FlatArg[]): void {
  switch (value.kind) {
    case 'scalar':
      to.push(value.value)
      return
    case 'digest':
      to.push(...value.words)
      return
    case 'wideInt':
      to.push(value.lo, value.hi)
      return
    case 'byteChunks':
      to.push(
        BigInt(value.chunkCount),
        ...value.chunks,
        value.remainder,
        BigInt(value.remainderLength),
      )
      return
    case 'sequence':
      to.push(BigInt(value.length))
      for (const element of value.elements) {
        appendFlat(element, to)
      }
      return
    case 'tuple':
      for (const element of value.elements) {
        appendFlat(element, to)
      }
      return
    case 'nested': {
      const inner: FlatArg[] = []
      for (const element of value.elements) {
        appendFlat(element, inner)
      }
      to.push(inner)
      return
    }
  }
}

export function flatten(value: SerializedValue): FlatArg[] {
  const out: FlatArg[] = []
  appendFlat(value, out)
  return out
}

/**
 * Render every scalar as `0x`-prefixed lowercase hex (`0x0` for zero)
 */
export function toHexArgs(flat: readonly FlatArg[]): HexArg[] {
  return flat.map((arg) =>
    typeof arg === 'bigint' ? numberToHex(arg) : toHexArgs(arg),
  )
}

export function serializeToHexArgs(value: FieldValue): Safe<HexArg[]> {
  const [error, serialized] = serialize(value)
  if (error) {
    return safeError(error)
  }
  return safeResult(toHexArgs(flatten(serialized)))
}
