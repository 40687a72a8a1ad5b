/**
 * Field-element value types
 *
 * `FieldValue` is the tagged input of the serializer: the producer states the
 * semantic type of every leaf instead of leaving it to be guessed from the
 * string content. `SerializedValue` mirrors the circuit's data layout and is
 * what the flattener walks.
 */

import type { Hex } from 'viem'

export type FieldValue =
  | FeltField
  | BoolField
  | U256Field
  | DigestField
  | ByteArrayField
  | ArrayField
  | RecordField
  | OptionField
  | NestedField

/** Native field element (u8..u128, felt252) */
export interface FeltField {
  kind: 'felt'
  value: bigint
}

export interface BoolField {
  kind: 'bool'
  value: boolean
}

/** 256-bit integer, emitted as (lo, hi) 128-bit halves */
export interface U256Field {
  kind: 'u256'
  value: bigint
}

/** 32-byte hash in display order, 64 hex characters without prefix */
export interface DigestField {
  kind: 'digest'
  hex: string
}

/** Arbitrary byte string, emitted as 31-byte limbs */
export interface ByteArrayField {
  kind: 'byteArray'
  bytes: Uint8Array
}

/** Length-prefixed sequence */
export interface ArrayField {
  kind: 'array'
  items: FieldValue[]
}

/**
 * Positional record. Entries marked `inline` are spliced into the parent
 * without a length prefix.
 */
export interface RecordField {
  kind: 'record'
  entries: RecordEntry[]
}

export type RecordEntry =
  | { name: string; inline: false; value: FieldValue }
  | { name: string; inline: true; values: FieldValue[] }

/** Option type; `undefined` value is the absent variant */
export interface OptionField {
  kind: 'option'
  value: FieldValue | undefined
}

/** List kept as a nested list by the flattener instead of being spliced */
export interface NestedField {
  kind: 'nested'
  items: FieldValue[]
}

export type SerializedValue =
  | ScalarValue
  | DigestValue
  | WideIntValue
  | ByteChunksValue
  | SequenceValue
  | TupleValue
  | NestedValue

export interface ScalarValue {
  kind: 'scalar'
  value: bigint
}

/** Eight u32 words */
export interface DigestValue {
  kind: 'digest'
  words: readonly bigint[]
}

export interface WideIntValue {
  kind: 'wideInt'
  lo: bigint
  hi: bigint
}

export interface ByteChunksValue {
  kind: 'byteChunks'
  chunkCount: number
  chunks: bigint[]
  remainder: bigint
  remainderLength: number
}

export interface SequenceValue {
  kind: 'sequence'
  length: number
  elements: SerializedValue[]
}

/** Record layout: elements in order, no length prefix */
export interface TupleValue {
  kind: 'tuple'
  elements: SerializedValue[]
}

export interface NestedValue {
  kind: 'nested'
  elements: SerializedValue[]
}

/** Flattened argument tree: scalars and nested lists only */
export type FlatArg = bigint | FlatArg[]

/** Flattened argument tree with every scalar rendered as hex */
export type HexArg = Hex | HexArg[]
