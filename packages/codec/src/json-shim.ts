/**
 * Untyped JSON compatibility shim
 *
 * Converts plain JSON (as written by the data generator) into tagged field
 * values by inspecting each leaf. Only for input whose semantic types are
 * unknown; producers that know their types build `FieldValue`s directly.
 *
 * Strings are matched in this order:
 *   1. 64 zeros              → zero digest
 *   2. 64 hex characters     → digest
 *   3. decimal digits        → u256
 *   4. `0x` + hex            → byte array
 * A 64-digit decimal therefore reads as a digest.
 *
 * Record keys starting with `_` hold raw tuples spliced into the parent
 * record: their items are integers (felts) or lists of raw items, which stay
 * nested. No other leaf shapes are read inside a raw tuple.
 */

import {
  ConversionError,
  ConversionErrorKind,
  type FieldValue,
  type HexArg,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'
import {
  array,
  bool,
  byteArrayFromHex,
  digest,
  felt,
  type InlineValues,
  inline,
  nested,
  none,
  record,
  u256,
} from './field-value'
import { serializeToHexArgs } from './flatten'

const ZERO_DIGEST = '0'.repeat(64)
const HEX64 = /^[0-9a-fA-F]{64}$/
const DECIMAL = /^[0-9]+$/

export const INLINE_KEY_PREFIX = '_'

function unsupportedType(value: unknown) {
  return safeError(
    new ConversionError(
      ConversionErrorKind.UNSUPPORTED_VALUE_TYPE,
      `Unsupported value type: ${typeof value}`,
      { value },
    ),
  )
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  )
}

export function stringToField(value: string): Safe<FieldValue> {
  if (value === ZERO_DIGEST) {
    return safeResult(digest(ZERO_DIGEST))
  }
  if (HEX64.test(value)) {
    return safeResult(digest(value))
  }
  if (DECIMAL.test(value)) {
    return safeResult(u256(BigInt(value)))
  }
  if (value.startsWith('0x')) {
    return byteArrayFromHex(value)
  }
  return safeError(
    new ConversionError(
      ConversionErrorKind.UNSUPPORTED_STRING_SHAPE,
      `Unexpected string format: ${value}`,
      { value },
    ),
  )
}

function listToFields(values: readonly unknown[]): Safe<FieldValue[]> {
  const out: FieldValue[] = []
  for (const item of values) {
    const [error, field] = fromUntypedJson(item)
    if (error) {
      return safeError(error)
    }
    out.push(field)
  }
  return safeResult(out)
}

function rawToField(value: unknown): Safe<FieldValue> {
  if (typeof value === 'bigint') {
    return safeResult(felt(value))
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return safeResult(felt(value))
  }
  if (Array.isArray(value)) {
    const items: FieldValue[] = []
    for (const item of value) {
      const [error, field] = rawToField(item)
      if (error) {
        return safeError(error)
      }
      items.push(field)
    }
    return safeResult(nested(items))
  }
  return unsupportedType(value)
}

function rawTupleToFields(values: readonly unknown[]): Safe<FieldValue[]> {
  const out: FieldValue[] = []
  for (const item of values) {
    const [error, field] = rawToField(item)
    if (error) {
      return safeError(error)
    }
    out.push(field)
  }
  return safeResult(out)
}

export function fromUntypedJson(value: unknown): Safe<FieldValue> {
  if (typeof value === 'boolean') {
    return safeResult(bool(value))
  }
  if (typeof value === 'bigint') {
    return safeResult(felt(value))
  }
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      return unsupportedType(value)
    }
    return safeResult(felt(value))
  }
  if (typeof value === 'string') {
    return stringToField(value)
  }
  if (value === null) {
    return safeResult(none())
  }
  if (Array.isArray(value)) {
    const [error, items] = listToFields(value)
    if (error) {
      return safeError(error)
    }
    return safeResult(array(items))
  }
  if (isPlainObject(value)) {
    const fields: Record<string, FieldValue | InlineValues> = {}
    for (const [key, entry] of Object.entries(value)) {
      if (key.startsWith(INLINE_KEY_PREFIX)) {
        if (!Array.isArray(entry)) {
          return unsupportedType(entry)
        }
        const [error, items] = rawTupleToFields(entry)
        if (error) {
          return safeError(error)
        }
        fields[key] = inline(...items)
      } else {
        const [error, field] = fromUntypedJson(entry)
        if (error) {
          return safeError(error)
        }
        fields[key] = field
      }
    }
    return safeResult(record(fields))
  }
  return unsupportedType(value)
}

/**
 * Hex program arguments for an untyped JSON document
 */
export function formatUntypedArgs(value: unknown): Safe<HexArg[]> {
  const [error, field] = fromUntypedJson(value)
  if (error) {
    return safeError(error)
  }
  return serializeToHexArgs(field)
}
