/**
 * Chain State Schema
 *
 * Zod schema for the chain-state checkpoint JSON. Big integers travel as
 * decimal strings.
 */

import type { ChainStateJson } from '@zcl/types'
import { z } from 'zod'
import { hash64Schema } from './header-record'

const decimalSchema = z.string().regex(/^\d+$/, 'Must be a decimal string')
const u32Schema = z.number().int().min(0).max(0xffffffff)

export const chainStateJsonSchema = z.object({
  block_height: u32Schema,
  total_work: decimalSchema,
  best_block_hash: hash64Schema,
  current_target: decimalSchema,
  prev_timestamps: z.array(u32Schema),
  epoch_start_time: u32Schema,
  pow_target_history: z.array(decimalSchema),
}) satisfies z.ZodType<ChainStateJson>
