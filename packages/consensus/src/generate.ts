/**
 * Program input generation
 *
 * Produces the human-readable program input: the initial chain state, the
 * blocks applied on top of it, and the chain state they lead to.
 */

import { logger } from '@zcl/core'
import {
  type ChainData,
  type ChainStateJson,
  type ConsensusParams,
  ConversionError,
  ConversionErrorKind,
  type FormattedBlock,
  type SafePromise,
  safeError,
  safeResult,
} from '@zcl/types'
import { bootstrapFromHeader } from './bootstrap'
import { advanceChainState, chainStateToJson } from './chain-state'
import { compactToTarget } from './compact-target'
import { formatBlock } from './header'
import type { HeaderSource } from './header-source'
import { MAINNET_PARAMS } from './params'

/**
 * Chain state at `initialHeight` followed by `numBlocks` blocks
 */
export async function generateChainData(
  source: HeaderSource,
  initialHeight: number,
  numBlocks: number,
  params: ConsensusParams = MAINNET_PARAMS,
): SafePromise<ChainData> {
  logger.debug(
    `Fetching initial chain state, blocks: [${initialHeight + 1}, ${initialHeight + numBlocks}]`,
  )

  const [hashError, initialHash] = await source.getBlockHash(initialHeight)
  if (hashError) {
    return safeError(hashError)
  }
  const [headError, head] = await source.getBlockHeader(initialHash)
  if (headError) {
    return safeError(headError)
  }
  const [stateError, initialState] = await bootstrapFromHeader(
    source,
    head,
    params,
  )
  if (stateError) {
    return safeError(stateError)
  }

  let chainState = initialState
  let nextHash = head.nextblockhash
  const blocks: FormattedBlock[] = []

  for (let i = 0; i < numBlocks; i++) {
    const height = initialHeight + i + 1
    if (!nextHash) {
      return safeError(
        new ConversionError(
          ConversionErrorKind.HEADER_NOT_FOUND,
          `No next block hash for block ${height}`,
          { height },
        ),
      )
    }

    const [blockError, header] = await source.getBlockHeader(nextHash)
    if (blockError) {
      return safeError(blockError)
    }
    const [advanceError, nextState] = advanceChainState(
      chainState,
      header,
      params,
    )
    if (advanceError) {
      return safeError(advanceError)
    }
    const [formatError, block] = formatBlock(header, params)
    if (formatError) {
      return safeError(formatError)
    }

    chainState = nextState
    blocks.push(block)
    nextHash = header.nextblockhash
    logger.info(`Fetched block ${height} ${i + 1}/${numBlocks}`)
  }

  // initial currentTarget is the first applied block's target
  let startState = initialState
  if (blocks.length > 0) {
    const [targetError, firstTarget] = compactToTarget(blocks[0].header.bits)
    if (targetError) {
      return safeError(targetError)
    }
    startState = { ...initialState, currentTarget: firstTarget }
  }

  return safeResult({ chainState: startState, blocks, expected: chainState })
}

export interface BlockJson {
  header: {
    version: number
    final_sapling_root: string
    time: number
    bits: number
    nonce: string
    indices: number[]
  }
  data: {
    variant_id: number
    merkle_root: string
  }
}

export interface ChainDataJson {
  chain_state: ChainStateJson
  blocks: BlockJson[]
  expected: ChainStateJson
}

export function blockToJson(block: FormattedBlock): BlockJson {
  return {
    header: {
      version: block.header.version,
      final_sapling_root: block.header.finalSaplingRoot,
      time: block.header.time,
      bits: block.header.bits,
      nonce: block.header.nonce,
      indices: [...block.header.indices],
    },
    data: {
      variant_id: block.data.variantId,
      merkle_root: block.data.merkleRoot,
    },
  }
}

export function chainDataToJson(data: ChainData): ChainDataJson {
  return {
    chain_state: chainStateToJson(data.chainState),
    blocks: data.blocks.map(blockToJson),
    expected: chainStateToJson(data.expected),
  }
}
