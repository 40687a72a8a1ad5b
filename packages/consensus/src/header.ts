/**
 * Header formatting
 *
 * Selects and normalises the header fields the circuit consumes. The
 * commitment field depends on the upgrade active at the header height, not on
 * which fields the record happens to carry.
 */

import { normalizeHex } from '@zcl/core'
import {
  type ConsensusParams,
  type FormattedBlock,
  type FormattedHeader,
  type RpcBlockHeader,
  type Safe,
  safeError,
  safeResult,
} from '@zcl/types'
import { commitmentField } from './activation'
import { parseCompactBits } from './compact-target'
import { parseSolutionHex } from './equihash'
import { MAINNET_PARAMS } from './params'

export const ZERO_HASH = '0'.repeat(64)

export function formatHeader(
  header: RpcBlockHeader,
  params: ConsensusParams = MAINNET_PARAMS,
): Safe<FormattedHeader> {
  const [bitsError, bits] = parseCompactBits(header.bits)
  if (bitsError) {
    return safeError(bitsError)
  }
  const [solutionError, indices] = parseSolutionHex(header.solution ?? '')
  if (solutionError) {
    return safeError(solutionError)
  }

  const commitment = header[commitmentField(header.height, params)]

  return safeResult({
    version: header.version,
    finalSaplingRoot: normalizeHex(commitment ?? ZERO_HASH),
    time: header.time,
    bits,
    nonce: normalizeHex(header.nonce ?? ZERO_HASH),
    indices,
  })
}

/**
 * Header plus the merkle-root transaction-data variant
 */
export function formatBlock(
  header: RpcBlockHeader,
  params: ConsensusParams = MAINNET_PARAMS,
): Safe<FormattedBlock> {
  const [error, formatted] = formatHeader(header, params)
  if (error) {
    return safeError(error)
  }
  const block: FormattedBlock = {
    header: formatted,
    data: {
      variantId: 0,
      merkleRoot: normalizeHex(header.merkleroot ?? ZERO_HASH),
    },
  }
  return safeResult(block)
}
