/**
 * Conversion error kinds
 *
 * Every failure raised while turning header records into chain states or
 * field-element arguments carries one of these kinds. A failure is fatal to
 * the value being converted; values converted independently in the same batch
 * are unaffected.
 */

export enum ConversionErrorKind {
  /** Integer outside [0, 2^252) for a felt or [0, 2^256) for a u256 */
  OUT_OF_RANGE_SCALAR = 'out_of_range_scalar',
  /** String is neither a digest, a decimal nor a 0x byte string */
  UNSUPPORTED_STRING_SHAPE = 'unsupported_string_shape',
  /** Value has no field-element mapping at all */
  UNSUPPORTED_VALUE_TYPE = 'unsupported_value_type',
  /** Compact bits are not exactly 4 bytes */
  INVALID_COMPACT_ENCODING = 'invalid_compact_encoding',
  /** Equihash solution is neither empty nor the expected length */
  INVALID_SOLUTION_LENGTH = 'invalid_solution_length',
  /** Header record does not match its schema or does not extend the chain */
  INVALID_HEADER_RECORD = 'invalid_header_record',
  /** Chain-state checkpoint does not match its schema or window capacities */
  INVALID_CHAIN_STATE = 'invalid_chain_state',
  /** Header source has no block at the requested height or hash */
  HEADER_NOT_FOUND = 'header_not_found',
}

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind
  readonly context?: Record<string, unknown>

  constructor(
    kind: ConversionErrorKind,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'ConversionError'
    this.kind = kind
    this.context = context
  }
}

export function isConversionError(
  error: unknown,
  kind?: ConversionErrorKind,
): error is ConversionError {
  return (
    error instanceof ConversionError &&
    (kind === undefined || error.kind === kind)
  )
}
