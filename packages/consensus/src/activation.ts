/**
 * Network upgrade activation
 *
 * Height-indexed predicates for upgrade boundaries. Every predicate is
 * `height >= activation height`, so once true it stays true.
 */

import { type ConsensusParams, NetworkUpgrade } from '@zcl/types'
import { MAINNET_PARAMS } from './params'

/** Upgrades ordered by activation height */
export const UPGRADE_ORDER: readonly NetworkUpgrade[] = [
  NetworkUpgrade.OVERWINTER,
  NetworkUpgrade.SAPLING,
  NetworkUpgrade.BLOSSOM,
  NetworkUpgrade.HEARTWOOD,
  NetworkUpgrade.CANOPY,
  NetworkUpgrade.NU5,
]

export function isUpgradeActive(
  upgrade: NetworkUpgrade,
  height: number,
  params: ConsensusParams = MAINNET_PARAMS,
): boolean {
  return height >= params.activationHeights[upgrade]
}

export const isOverwinterActive = (height: number): boolean =>
  isUpgradeActive(NetworkUpgrade.OVERWINTER, height)

export const isSaplingActive = (height: number): boolean =>
  isUpgradeActive(NetworkUpgrade.SAPLING, height)

export const isBlossomActive = (height: number): boolean =>
  isUpgradeActive(NetworkUpgrade.BLOSSOM, height)

export const isHeartwoodActive = (height: number): boolean =>
  isUpgradeActive(NetworkUpgrade.HEARTWOOD, height)

export const isCanopyActive = (height: number): boolean =>
  isUpgradeActive(NetworkUpgrade.CANOPY, height)

export const isNu5Active = (height: number): boolean =>
  isUpgradeActive(NetworkUpgrade.NU5, height)

/**
 * Newest upgrade active at `height`, `undefined` before Overwinter
 */
export function activeUpgrade(
  height: number,
  params: ConsensusParams = MAINNET_PARAMS,
): NetworkUpgrade | undefined {
  let newest: NetworkUpgrade | undefined
  for (const upgrade of UPGRADE_ORDER) {
    if (!isUpgradeActive(upgrade, height, params)) {
      break
    }
    newest = upgrade
  }
  return newest
}

/**
 * Expected seconds between blocks at `height`
 */
export function powTargetSpacing(
  height: number,
  params: ConsensusParams = MAINNET_PARAMS,
): number {
  return isUpgradeActive(NetworkUpgrade.BLOSSOM, height, params)
    ? params.postBlossomPowTargetSpacing
    : params.preBlossomPowTargetSpacing
}

export type CommitmentField = 'finalsaplingroot' | 'blockcommitments'

/**
 * Header record field holding the header commitment at `height`.
 *
 * - before Sapling: reserved field, all zeros
 * - Sapling to Heartwood: hashFinalSaplingRoot
 * - from Heartwood: hashLightClientRoot, then hashBlockCommitments from NU5
 */
export function commitmentField(
  height: number,
  params: ConsensusParams = MAINNET_PARAMS,
): CommitmentField {
  return isUpgradeActive(NetworkUpgrade.HEARTWOOD, height, params)
    ? 'blockcommitments'
    : 'finalsaplingroot'
}
