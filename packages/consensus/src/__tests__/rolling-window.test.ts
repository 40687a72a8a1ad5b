import { describe, expect, it } from 'vitest'
import { RollingWindow } from '../rolling-window'

describe('RollingWindow', () => {
  it('should keep the newest values up to capacity', () => {
    const window = RollingWindow.from([1, 2, 3, 4], 3)
    expect(window.toArray()).toEqual([2, 3, 4])
    expect(window.isFull).toBe(true)
    expect(window.capacity).toBe(3)
  })

  it('should evict the oldest value when appending to a full window', () => {
    const window = RollingWindow.from([1, 2, 3], 3).append(4)
    expect(window.toArray()).toEqual([2, 3, 4])
  })

  it('should grow until full', () => {
    let window = RollingWindow.empty<number>(2)
    expect(window.isEmpty).toBe(true)
    window = window.append(1)
    expect(window.length).toBe(1)
    expect(window.isFull).toBe(false)
    window = window.append(2).append(3)
    expect(window.toArray()).toEqual([2, 3])
  })

  it('should fill missing slots in front of existing values', () => {
    expect(RollingWindow.from([1], 3).fill(7).toArray()).toEqual([7, 7, 1])
    expect(RollingWindow.from([1, 2], 2).fill(7).toArray()).toEqual([1, 2])
  })

  it('should not modify the receiver', () => {
    const values = [1, 2]
    const window = RollingWindow.from(values, 2)
    window.append(3)
    window.fill(0)
    expect(window.toArray()).toEqual([1, 2])
    window.toArray().push(9)
    expect(window.length).toBe(2)
    expect(values).toEqual([1, 2])
  })
})
