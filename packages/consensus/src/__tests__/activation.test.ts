import { NetworkUpgrade } from '@zcl/types'
import { describe, expect, it } from 'vitest'
import {
  activeUpgrade,
  commitmentField,
  isBlossomActive,
  isCanopyActive,
  isHeartwoodActive,
  isNu5Active,
  isOverwinterActive,
  isSaplingActive,
  isUpgradeActive,
  powTargetSpacing,
  UPGRADE_ORDER,
} from '../activation'
import { MAINNET_PARAMS } from '../params'

describe('Network upgrade activation', () => {
  it('should activate each upgrade at its mainnet height', () => {
    const cases: Array<[(height: number) => boolean, number]> = [
      [isOverwinterActive, 347500],
      [isSaplingActive, 419200],
      [isBlossomActive, 653600],
      [isHeartwoodActive, 903000],
      [isCanopyActive, 1046400],
      [isNu5Active, 1687104],
    ]
    for (const [predicate, height] of cases) {
      expect(predicate(height - 1)).toBe(false)
      expect(predicate(height)).toBe(true)
      expect(predicate(height + 1)).toBe(true)
    }
  })

  it('should report the newest active upgrade', () => {
    expect(activeUpgrade(0)).toBeUndefined()
    expect(activeUpgrade(347499)).toBeUndefined()
    expect(activeUpgrade(347500)).toBe(NetworkUpgrade.OVERWINTER)
    expect(activeUpgrade(500000)).toBe(NetworkUpgrade.SAPLING)
    expect(activeUpgrade(903000)).toBe(NetworkUpgrade.HEARTWOOD)
    expect(activeUpgrade(1687104)).toBe(NetworkUpgrade.NU5)
  })

  it('should never deactivate an upgrade as height grows', () => {
    const heights = [0, 347500, 419199, 653600, 903001, 1046400, 2000000]
    for (const upgrade of UPGRADE_ORDER) {
      let seenActive = false
      for (const height of heights) {
        const active = isUpgradeActive(upgrade, height)
        if (seenActive) {
          expect(active).toBe(true)
        }
        seenActive = seenActive || active
      }
    }
  })

  it('should order activation heights increasingly', () => {
    const heights = UPGRADE_ORDER.map(
      (upgrade) => MAINNET_PARAMS.activationHeights[upgrade],
    )
    expect(heights).toEqual([...heights].sort((a, b) => a - b))
  })

  it('should halve block spacing at Blossom', () => {
    expect(powTargetSpacing(653599)).toBe(150)
    expect(powTargetSpacing(653600)).toBe(75)
  })

  it('should switch the commitment field at Heartwood', () => {
    expect(commitmentField(0)).toBe('finalsaplingroot')
    expect(commitmentField(902999)).toBe('finalsaplingroot')
    expect(commitmentField(903000)).toBe('blockcommitments')
    expect(commitmentField(1687104)).toBe('blockcommitments')
  })

  it('should honour custom activation heights', () => {
    const params = {
      ...MAINNET_PARAMS,
      activationHeights: {
        ...MAINNET_PARAMS.activationHeights,
        [NetworkUpgrade.HEARTWOOD]: 10,
      },
    }
    expect(commitmentField(10, params)).toBe('blockcommitments')
    expect(commitmentField(9, params)).toBe('finalsaplingroot')
  })
})
