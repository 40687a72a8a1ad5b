/**
 * Chain state tracking
 *
 * A chain state is the rolling snapshot of consensus history needed to check
 * the next block. `advanceChainState` is a pure transition from the state
 * after block h to the state after block h + 1, so a persisted snapshot can
 * be resumed from without replaying history.
 */

import { chainStateJsonSchema, normalizeHex } from '@zcl/core'
import {
  type ChainState,
  type ChainStateJson,
  type ConsensusParams,
  ConversionError,
  ConversionErrorKind,
  type RpcBlockHeader,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'
import {
  compactToTarget,
  parseCompactBits,
  POW_LIMIT_TARGET,
  targetToWork,
} from './compact-target'
import { MAINNET_PARAMS } from './params'
import { RollingWindow } from './rolling-window'

/**
 * Apply one header to a chain state.
 *
 * 1. the header time joins `prevTimestamps` (newest `maxTimestampHistory` kept)
 * 2. `epochStartTime` moves to the header time on a retarget boundary
 * 3. the header target joins `powTargetHistory`; an empty history is first
 *    seeded with the proof-of-work ceiling
 * 4. the header's work is added to `totalWork`
 * 5. height, hash and current target come from the header
 *
 * Headers must be applied in height order without gaps; see `applyHeaders`.
 */
export function advanceChainState(
  state: ChainState,
  header: RpcBlockHeader,
  params: ConsensusParams = MAINNET_PARAMS,
): Safe<ChainState> {
  const [bitsError, bits] = parseCompactBits(header.bits)
  if (bitsError) {
    return safeError(bitsError)
  }
  const [targetError, target] = compactToTarget(bits)
  if (targetError) {
    return safeError(targetError)
  }

  const prevTimestamps = RollingWindow.from(
    state.prevTimestamps,
    params.maxTimestampHistory,
  ).append(header.time)

  const epochStartTime =
    header.height % params.retargetInterval === 0
      ? header.time
      : state.epochStartTime

  let powTargetHistory = RollingWindow.from(
    state.powTargetHistory,
    params.powAveragingWindow,
  )
  if (powTargetHistory.isEmpty) {
    powTargetHistory = powTargetHistory.fill(POW_LIMIT_TARGET)
  }
  powTargetHistory = powTargetHistory.append(target)

  return safeResult({
    blockHeight: header.height,
    totalWork: state.totalWork + targetToWork(target),
    bestBlockHash: normalizeHex(header.hash),
    currentTarget: target,
    prevTimestamps: prevTimestamps.toArray(),
    epochStartTime,
    powTargetHistory: powTargetHistory.toArray(),
  })
}

/**
 * Fold headers into a chain state in order. Fails on the first header that
 * does not extend the current tip by exactly one block.
 */
export function applyHeaders(
  state: ChainState,
  headers: readonly RpcBlockHeader[],
  params: ConsensusParams = MAINNET_PARAMS,
): Safe<ChainState> {
  let current = state
  for (const header of headers) {
    if (header.height !== current.blockHeight + 1) {
      return safeError(
        new ConversionError(
          ConversionErrorKind.INVALID_HEADER_RECORD,
          `Header at height ${header.height} does not extend chain state at height ${current.blockHeight}`,
          { expected: current.blockHeight + 1, actual: header.height },
        ),
      )
    }
    const [error, next] = advanceChainState(current, header, params)
    if (error) {
      return safeError(error)
    }
    current = next
  }
  return safeResult(current)
}

export function chainStateToJson(state: ChainState): ChainStateJson {
  return {
    block_height: state.blockHeight,
    total_work: state.totalWork.toString(),
    best_block_hash: state.bestBlockHash,
    current_target: state.currentTarget.toString(),
    prev_timestamps: [...state.prevTimestamps],
    epoch_start_time: state.epochStartTime,
    pow_target_history: state.powTargetHistory.map((target) =>
      target.toString(),
    ),
  }
}

/**
 * Restore a chain state from its checkpoint JSON
 */
export function chainStateFromJson(
  json: unknown,
  params: ConsensusParams = MAINNET_PARAMS,
): Safe<ChainState> {
  const parsed = chainStateJsonSchema.safeParse(json)
  if (!parsed.success) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.INVALID_CHAIN_STATE,
        `Invalid chain state: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      ),
    )
  }

  const data = parsed.data
  if (
    data.prev_timestamps.length > params.maxTimestampHistory ||
    data.pow_target_history.length > params.powAveragingWindow
  ) {
    return safeError(
      new ConversionError(
        ConversionErrorKind.INVALID_CHAIN_STATE,
        'Chain state windows exceed their capacity',
        {
          prevTimestamps: data.prev_timestamps.length,
          powTargetHistory: data.pow_target_history.length,
        },
      ),
    )
  }

  return safeResult({
    blockHeight: data.block_height,
    totalWork: BigInt(data.total_work),
    bestBlockHash: data.best_block_hash.toLowerCase(),
    currentTarget: BigInt(data.current_target),
    prevTimestamps: data.prev_timestamps,
    epochStartTime: data.epoch_start_time,
    powTargetHistory: data.pow_target_history.map((value) => BigInt(value)),
  })
}
