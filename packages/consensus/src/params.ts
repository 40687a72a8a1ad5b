/**
 * Zcash mainnet consensus parameters
 */

import { type ConsensusParams, NetworkUpgrade } from '@zcl/types'

export const POW_AVERAGING_WINDOW = 17
export const MEDIAN_TIME_WINDOW = 11
export const MAX_TIMESTAMP_HISTORY = POW_AVERAGING_WINDOW + MEDIAN_TIME_WINDOW

/** Difficulty epoch length used for epoch start tracking */
export const RETARGET_INTERVAL = 2016

/** Mainnet genesis block timestamp */
export const GENESIS_TIME = 1477953400

export const MAINNET_PARAMS: ConsensusParams = Object.freeze({
  powAveragingWindow: POW_AVERAGING_WINDOW,
  medianTimeWindow: MEDIAN_TIME_WINDOW,
  maxTimestampHistory: MAX_TIMESTAMP_HISTORY,
  activationHeights: Object.freeze({
    [NetworkUpgrade.OVERWINTER]: 347500, // ZIP 200-203, 143
    [NetworkUpgrade.SAPLING]: 419200, // ZIP 205, 212, 213, 243
    [NetworkUpgrade.BLOSSOM]: 653600, // ZIP 208, 75s spacing
    [NetworkUpgrade.HEARTWOOD]: 903000, // ZIP 213, 221, hashLightClientRoot
    [NetworkUpgrade.CANOPY]: 1046400, // ZIP 211, 212, 214-216
    [NetworkUpgrade.NU5]: 1687104, // ZIP 224-227, 244, Orchard
  }),
  preBlossomPowTargetSpacing: 150,
  postBlossomPowTargetSpacing: 75,
  powLimitBits: 0x1d00ffff,
  retargetInterval: RETARGET_INTERVAL,
  genesisTime: GENESIS_TIME,
})
