import {
  ConversionErrorKind,
  isConversionError,
  type RpcBlockHeader,
} from '@zcl/types'
import { describe, expect, it } from 'vitest'
import { bootstrapChainState } from '../bootstrap'
import { POW_LIMIT_TARGET, targetToWork } from '../compact-target'
import { MemoryHeaderSource } from '../header-source'
import { GENESIS_TIME } from '../params'
import { blockHash, blockTime, buildChain } from './chain-fixture'

function times(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => blockTime(from + i))
}

describe('Chain state bootstrap', () => {
  const source = new MemoryHeaderSource(buildChain(0, 40))

  it('should collect full windows from ancestors', async () => {
    const [error, state] = await bootstrapChainState(source, 30)
    if (error) {
      throw error
    }
    expect(state.blockHeight).toBe(30)
    expect(state.bestBlockHash).toBe(blockHash(30))
    expect(state.prevTimestamps).toEqual(times(3, 30))
    expect(state.powTargetHistory).toEqual(
      new Array<bigint>(17).fill(POW_LIMIT_TARGET),
    )
    expect(state.currentTarget).toBe(POW_LIMIT_TARGET)
    expect(state.epochStartTime).toBe(GENESIS_TIME)
    expect(state.totalWork).toBe(targetToWork(POW_LIMIT_TARGET) * 31n)
  })

  it('should not pad windows near genesis', async () => {
    const [error, state] = await bootstrapChainState(source, 5)
    if (error) {
      throw error
    }
    expect(state.prevTimestamps).toEqual(times(0, 5))
    expect(state.powTargetHistory).toHaveLength(6)
  })

  it('should bootstrap the genesis block alone', async () => {
    const [, state] = await bootstrapChainState(source, 0)
    expect(state?.prevTimestamps).toEqual([blockTime(0)])
    expect(state?.powTargetHistory).toEqual([POW_LIMIT_TARGET])
  })

  it('should keep the target history in height order', async () => {
    const withTarget = new MemoryHeaderSource(
      buildChain(0, 40, { 20: { bits: '1c0fffff' } }),
    )
    const [, state] = await bootstrapChainState(withTarget, 30)
    // heights 14..30, so height 20 sits at index 6
    expect(state?.powTargetHistory[6]).toBe(0x0fffffn << 200n)
    expect(state?.powTargetHistory[5]).toBe(POW_LIMIT_TARGET)
  })

  it('should read the epoch start from the epoch-aligned header', async () => {
    const late = new MemoryHeaderSource(
      buildChain(2000, 2030, { 2016: { time: 1700000000 } }),
    )
    const [error, state] = await bootstrapChainState(late, 2030)
    if (error) {
      throw error
    }
    expect(state.epochStartTime).toBe(1700000000)
    expect(state.prevTimestamps).toHaveLength(28)
  })

  it('should prefer the node chainwork', async () => {
    const headers: RpcBlockHeader[] = buildChain(0, 10, {
      10: { chainwork: `${'0'.repeat(60)}01f4` },
    })
    const [, state] = await bootstrapChainState(
      new MemoryHeaderSource(headers),
      10,
    )
    expect(state?.totalWork).toBe(500n)
  })

  it('should fail when an ancestor is missing', async () => {
    const partial = new MemoryHeaderSource(buildChain(10, 20))
    const [error] = await bootstrapChainState(partial, 12)
    expect(isConversionError(error, ConversionErrorKind.HEADER_NOT_FOUND)).toBe(
      true,
    )
  })

  it('should fail for an unknown height', async () => {
    const [error] = await bootstrapChainState(source, 41)
    expect(error?.message).toBe('No block at height 41')
  })
})
