/**
 * Header record types
 *
 * `RpcBlockHeader` is the shape returned by a node's `getblockheader` call.
 * The formatted variants are the field selection the circuit consumes.
 */

import type { ChainState } from './consensus'

export interface RpcBlockHeader {
  height: number
  hash: string
  previousblockhash?: string
  nextblockhash?: string
  time: number
  /** Compact target, 8 hex characters */
  bits: string
  nonce?: string
  solution?: string
  version: number
  merkleroot?: string
  finalsaplingroot?: string
  blockcommitments?: string
  /** Cumulative work up to this block, hex */
  chainwork?: string
}

export interface FormattedHeader {
  version: number
  /** Sapling root or block commitments, depending on the active upgrade */
  finalSaplingRoot: string
  time: number
  bits: number
  nonce: string
  /** Unpacked Equihash indices, empty when the record has no solution */
  indices: number[]
}

export interface MerkleRootData {
  variantId: 0
  merkleRoot: string
}

export interface FormattedBlock {
  header: FormattedHeader
  data: MerkleRootData
}

/**
 * Initial state, the blocks applied to it, and the state they lead to
 */
export interface ChainData {
  chainState: ChainState
  blocks: FormattedBlock[]
  expected: ChainState
}
