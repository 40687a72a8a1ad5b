/**
 * Immutable bounded window, oldest entry first.
 *
 * Appending to a full window evicts the oldest entry. Every operation returns
 * a new window; the receiver is never modified.
 */
export class RollingWindow<T> {
  private constructor(
    private readonly entries: readonly T[],
    readonly capacity: number,
  ) {}

  static empty<T>(capacity: number): RollingWindow<T> {
    return new RollingWindow<T>([], capacity)
  }

  /**
   * Window over the newest `capacity` values of `values`
   */
  static from<T>(values: readonly T[], capacity: number): RollingWindow<T> {
    return new RollingWindow(
      values.slice(Math.max(0, values.length - capacity)),
      capacity,
    )
  }

  get length(): number {
    return this.entries.length
  }

  get isEmpty(): boolean {
    return this.entries.length === 0
  }

  get isFull(): boolean {
    return this.entries.length === this.capacity
  }

  append(value: T): RollingWindow<T> {
    const next = [...this.entries, value]
    return RollingWindow.from(next, this.capacity)
  }

  /** Fill the window with `value` up to capacity */
  fill(value: T): RollingWindow<T> {
    const missing = this.capacity - this.entries.length
    return new RollingWindow(
      [...new Array<T>(missing).fill(value), ...this.entries],
      this.capacity,
    )
  }

  toArray(): T[] {
    return [...this.entries]
  }
}
