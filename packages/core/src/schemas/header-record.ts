/**
 * Header Record Schema
 *
 * Zod schema for `getblockheader`-shaped records as returned by a Zcash node.
 * Unknown keys (confirmations, difficulty, ...) are stripped.
 */

import {
  ConversionError,
  ConversionErrorKind,
  type RpcBlockHeader,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'
import { z } from 'zod'

/** 64 hex characters, no prefix */
export const hash64Schema = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, 'Must be a 64-character hex string')

const hexStringSchema = z
  .string()
  .regex(/^(0x)?[0-9a-fA-F]*$/, 'Must be a hex string')

const u32Schema = z.number().int().min(0).max(0xffffffff)

export const rpcBlockHeaderSchema = z.object({
  height: z.number().int().min(0),
  hash: hash64Schema,
  previousblockhash: hash64Schema.optional(),
  nextblockhash: hash64Schema.optional(),
  time: u32Schema,
  bits: z
    .string()
    .regex(/^(0x|0X)?[0-9a-fA-F]{8}$/, 'Must be 8 hex characters'),
  nonce: hexStringSchema.optional(),
  solution: hexStringSchema.optional(),
  version: u32Schema,
  merkleroot: hash64Schema.optional(),
  finalsaplingroot: hash64Schema.optional(),
  blockcommitments: hash64Schema.optional(),
  chainwork: hexStringSchema.optional(),
})

/**
 * Validate an untyped record as a header
 */
export function parseRpcBlockHeader(record: unknown): Safe<RpcBlockHeader> {
  const parsed = rpcBlockHeaderSchema.safeParse(record)
  if (!parsed.success) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.INVALID_HEADER_RECORD,
        `Invalid header record: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      ),
    )
  }
  return safeResult(parsed.data)
}
