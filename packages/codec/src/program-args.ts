/**
 * Program argument layout
 *
 * Typed mapping from generated chain data to the prover's input. Field order
 * is positional and must match the program's struct definitions:
 *
 *   ChainState { block_height, total_work, best_block_hash, current_target,
 *                prev_timestamps, epoch_start_time, pow_target_history }
 *   Block      { header: { version, final_sapling_root, time, bits, nonce,
 *                          indices },
 *                data:   { variant_id, merkle_root } }
 *   Args       { chain_state, blocks, expected }
 */

import type {
  ChainData,
  ChainState,
  FieldValue,
  FormattedBlock,
  FormattedHeader,
  HexArg,
  RecordField,
  Safe,
} from '@zcl/types'
import { array, digest, felt, record, u256 } from './field-value'
import { serializeToHexArgs } from './flatten'

export function chainStateField(state: ChainState): RecordField {
  return record({
    block_height: felt(state.blockHeight),
    total_work: u256(state.totalWork),
    best_block_hash: digest(state.bestBlockHash),
    current_target: u256(state.currentTarget),
    prev_timestamps: array(state.prevTimestamps.map((time) => felt(time))),
    epoch_start_time: felt(state.epochStartTime),
    pow_target_history: array(
      state.powTargetHistory.map((target) => u256(target)),
    ),
  })
}

export function headerField(header: FormattedHeader): RecordField {
  return record({
    version: felt(header.version),
    final_sapling_root: digest(header.finalSaplingRoot),
    time: felt(header.time),
    bits: felt(header.bits),
    nonce: digest(header.nonce),
    indices: array(header.indices.map((index) => felt(index))),
  })
}

export function blockField(block: FormattedBlock): RecordField {
  return record({
    header: headerField(block.header),
    data: record({
      variant_id: felt(block.data.variantId),
      merkle_root: digest(block.data.merkleRoot),
    }),
  })
}

export function programArgsField(data: ChainData): FieldValue {
  return record({
    chain_state: chainStateField(data.chainState),
    blocks: array(data.blocks.map(blockField)),
    expected: chainStateField(data.expected),
  })
}

/**
 * Serialized, flattened and hex-encoded program input
 */
export function buildProgramArgs(data: ChainData): Safe<HexArg[]> {
  return serializeToHexArgs(programArgsField(data))
}
