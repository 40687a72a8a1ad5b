/**
 * Header sources
 *
 * `HeaderSource` is the seam to whatever serves `getblockhash` /
 * `getblockheader`. `MemoryHeaderSource` serves validated records held in
 * memory, e.g. loaded from a JSON dump.
 */

import { normalizeHex, parseRpcBlockHeader } from '@zcl/core'
import {
  ConversionError,
  ConversionErrorKind,
  type RpcBlockHeader,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
} from '@zcl/types'

export interface HeaderSource {
  getBlockHash(height: number): SafePromise<string>
  getBlockHeader(hash: string): SafePromise<RpcBlockHeader>
}

export class MemoryHeaderSource implements HeaderSource {
  private readonly byHash = new Map<string, RpcBlockHeader>()
  private readonly byHeight = new Map<number, RpcBlockHeader>()

  constructor(headers: readonly RpcBlockHeader[]) {
    for (const header of headers) {
      this.byHash.set(normalizeHex(header.hash), header)
      this.byHeight.set(header.height, header)
    }
  }

  /**
   * Validate untyped records and index them
   */
  static fromRecords(records: readonly unknown[]): Safe<MemoryHeaderSource> {
    const headers: RpcBlockHeader[] = []
    for (const record of records) {
      const [error, header] = parseRpcBlockHeader(record)
      if (error) {
        return safeError(error)
      }
      headers.push(header)
    }
    return safeResult(new MemoryHeaderSource(headers))
  }

  get size(): number {
    return this.byHash.size
  }

  async getBlockHash(height: number): SafePromise<string> {
    const header = this.byHeight.get(height)
    if (!header) {
      return safeError(
        new ConversionError(
          ConversionErrorKind.HEADER_NOT_FOUND,
          `No block at height ${height}`,
          { height },
        ),
      )
    }
    return safeResult(header.hash)
  }

  async getBlockHeader(hash: string): SafePromise<RpcBlockHeader> {
    const header = this.byHash.get(normalizeHex(hash))
    if (!header) {
      return safeError(
        new ConversionError(
          ConversionErrorKind.HEADER_NOT_FOUND,
          `No block with hash ${hash}`,
          { hash },
        ),
      )
    }
    return safeResult(header)
  }
}
