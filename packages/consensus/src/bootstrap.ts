/**
 * Initial chain state
 *
 * Builds the chain state after block H from the header at H and up to
 * max(M + W − 1, W − 1) of its ancestors. The windows are never padded: a
 * short `prevTimestamps` or `powTargetHistory` tells the circuit the chain
 * is too young for a full difficulty window.
 */

import { logger, normalizeHex } from '@zcl/core'
import {
  type ChainState,
  type ConsensusParams,
  type RpcBlockHeader,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
} from '@zcl/types'
import {
  compactToTarget,
  parseCompactBits,
  targetToWork,
} from './compact-target'
import type { HeaderSource } from './header-source'
import { MAINNET_PARAMS } from './params'

async function headerAt(
  source: HeaderSource,
  height: number,
): SafePromise<RpcBlockHeader> {
  const [hashError, hash] = await source.getBlockHash(height)
  if (hashError) {
    return safeError(hashError)
  }
  return source.getBlockHeader(hash)
}

function headerTarget(header: RpcBlockHeader): Safe<bigint> {
  const [bitsError, bits] = parseCompactBits(header.bits)
  if (bitsError) {
    return safeError(bitsError)
  }
  return compactToTarget(bits)
}

/**
 * Chain state after the block at `height`
 */
export async function bootstrapChainState(
  source: HeaderSource,
  height: number,
  params: ConsensusParams = MAINNET_PARAMS,
): SafePromise<ChainState> {
  const [headError, head] = await headerAt(source, height)
  if (headError) {
    return safeError(headError)
  }
  return bootstrapFromHeader(source, head, params)
}

/**
 * Chain state after the block `head`, fetching its ancestors from `source`
 */
export async function bootstrapFromHeader(
  source: HeaderSource,
  head: RpcBlockHeader,
  params: ConsensusParams = MAINNET_PARAMS,
): SafePromise<ChainState> {
  const height = head.height
  const [targetError, target] = headerTarget(head)
  if (targetError) {
    return safeError(targetError)
  }

  const maxAncestors = Math.min(
    height,
    Math.max(params.maxTimestampHistory - 1, params.powAveragingWindow - 1),
  )

  const prevTimestamps = [head.time]
  const powTargetHistory = [target]
  let current = head

  for (let i = 0; i < maxAncestors; i++) {
    const previousHash = current.previousblockhash
    if (!previousHash) {
      break
    }
    const [ancestorError, ancestor] = await source.getBlockHeader(previousHash)
    if (ancestorError) {
      return safeError(ancestorError)
    }
    logger.debug(`Fetched ancestor ${ancestor.height} of block ${height}`)

    if (prevTimestamps.length < params.maxTimestampHistory) {
      prevTimestamps.unshift(ancestor.time)
    }
    if (powTargetHistory.length < params.powAveragingWindow) {
      const [ancestorTargetError, ancestorTarget] = headerTarget(ancestor)
      if (ancestorTargetError) {
        return safeError(ancestorTargetError)
      }
      powTargetHistory.unshift(ancestorTarget)
    }
    current = ancestor
  }

  let epochStartTime = params.genesisTime
  if (height >= params.retargetInterval) {
    const epochHeight =
      Math.floor(height / params.retargetInterval) * params.retargetInterval
    const [epochError, epochHeader] = await headerAt(source, epochHeight)
    if (epochError) {
      return safeError(epochError)
    }
    epochStartTime = epochHeader.time
  }

  return safeResult({
    blockHeight: height,
    totalWork: initialTotalWork(head, target),
    bestBlockHash: normalizeHex(head.hash),
    currentTarget: target,
    prevTimestamps,
    epochStartTime,
    powTargetHistory,
  })
}

/**
 * The node's chainwork when the record carries it, otherwise the block's own
 * work times (height + 1).
 */
function initialTotalWork(head: RpcBlockHeader, target: bigint): bigint {
  const chainwork = head.chainwork ? normalizeHex(head.chainwork) : ''
  if (chainwork.length > 0) {
    return BigInt(`0x${chainwork}`)
  }
  return targetToWork(target) * BigInt(head.height + 1)
}
