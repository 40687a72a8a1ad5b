/**
 * Field value constructors
 *
 * The producer of a value tree states each leaf's type here, so the
 * serializer never has to guess from string content.
 */

import { parseHexBytes } from '@zcl/core'
import {
  type ArrayField,
  type BoolField,
  type ByteArrayField,
  type DigestField,
  type FeltField,
  type FieldValue,
  type NestedField,
  type OptionField,
  type RecordEntry,
  type RecordField,
  type Safe,
  type U256Field,
  safeError,
  safeResult,
} from '@zcl/types'

/**
 * Fields spliced into the enclosing record without a length prefix
 */
export interface InlineValues {
  kind: 'inline'
  values: FieldValue[]
}

export function felt(value: bigint | number): FeltField {
  return { kind: 'felt', value: BigInt(value) }
}

export function bool(value: boolean): BoolField {
  return { kind: 'bool', value }
}

export function u256(value: bigint | number): U256Field {
  return { kind: 'u256', value: BigInt(value) }
}

/**
 * @param hex - 64 hex characters in display order, `0x` optional
 */
export function digest(hex: string): DigestField {
  return { kind: 'digest', hex }
}

export function byteArray(bytes: Uint8Array): ByteArrayField {
  return { kind: 'byteArray', bytes }
}

export function byteArrayFromHex(hex: string): Safe<ByteArrayField> {
  const [error, bytes] = parseHexBytes(hex)
  if (error) {
    return safeError(error)
  }
  return safeResult(byteArray(bytes))
}

export function array(items: FieldValue[]): ArrayField {
  return { kind: 'array', items }
}

export function nested(items: FieldValue[]): NestedField {
  return { kind: 'nested', items }
}

export function none(): OptionField {
  return { kind: 'option', value: undefined }
}

export function some(value: FieldValue): OptionField {
  return { kind: 'option', value }
}

export function inline(...values: FieldValue[]): InlineValues {
  return { kind: 'inline', values }
}

/**
 * Positional record; field order is the object's key order
 */
export function record(
  fields: Record<string, FieldValue | InlineValues>,
): RecordField {
  const entries: RecordEntry[] = Object.entries(fields).map(([name, field]) =>
    field.kind === 'inline'
      ? { name, inline: true, values: field.values }
      : { name, inline: false, value: field },
  )
  return { kind: 'record', entries }
}
