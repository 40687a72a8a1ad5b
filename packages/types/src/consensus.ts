/**
 * Consensus Types for the Zcash light client
 *
 * Parameters and the rolling chain-state snapshot consumed by the
 * light-client circuit.
 */

/**
 * Network upgrades whose activation changes header semantics or block spacing
 */
export enum NetworkUpgrade {
  OVERWINTER = 'overwinter',
  SAPLING = 'sapling',
  BLOSSOM = 'blossom',
  HEARTWOOD = 'heartwood',
  CANOPY = 'canopy',
  NU5 = 'nu5',
}

/**
 * Process-wide consensus constants
 */
export interface ConsensusParams {
  /** Blocks in the difficulty averaging window */
  readonly powAveragingWindow: number
  /** Blocks in the median-time-past window */
  readonly medianTimeWindow: number
  /** Averaging window + median-time window */
  readonly maxTimestampHistory: number
  /** Activation height per upgrade, increasing in declaration order */
  readonly activationHeights: Readonly<Record<NetworkUpgrade, number>>
  /** Seconds between blocks before Blossom */
  readonly preBlossomPowTargetSpacing: number
  /** Seconds between blocks from Blossom on */
  readonly postBlossomPowTargetSpacing: number
  /** Compact encoding of the proof-of-work ceiling */
  readonly powLimitBits: number
  /** Blocks per epoch for epoch start tracking */
  readonly retargetInterval: number
  /** Timestamp of the genesis block */
  readonly genesisTime: number
}

/**
 * Rolling consensus snapshot after applying the block at `blockHeight`.
 * Snapshots are never mutated; every transition produces a new one.
 */
export interface ChainState {
  readonly blockHeight: number
  readonly totalWork: bigint
  /** Display-order block hash, 64 hex characters without prefix */
  readonly bestBlockHash: string
  readonly currentTarget: bigint
  /** Oldest first, at most `maxTimestampHistory` entries */
  readonly prevTimestamps: readonly number[]
  readonly epochStartTime: number
  /** Oldest first, at most `powAveragingWindow` entries */
  readonly powTargetHistory: readonly bigint[]
}

/**
 * Checkpoint / output JSON shape of a chain state
 */
export interface ChainStateJson {
  block_height: number
  total_work: string
  best_block_hash: string
  current_target: string
  prev_timestamps: number[]
  epoch_start_time: number
  pow_target_history: string[]
}
