/**
 * Fixed-size circular buffer of timestamped samples, backed by Float64Array.
 * Holds the recent tick intervals for the status store.
 */
export class RingBuffer {
  private readonly buf: Float64Array
  private readonly timestamps: Float64Array
  private head = 0 // next write index
  private count = 0 // number of valid samples

  constructor(readonly capacity: number) {
    this.buf = new Float64Array(capacity)
    this.timestamps = new Float64Array(capacity)
  }

  push(value: number, timestamp: number): void {
    this.buf[this.head] = value
    this.timestamps[this.head] = timestamp
    this.head = (this.head + 1) % this.capacity
    if (this.count < this.capacity) this.count++
  }

  /** Number of valid samples. */
  get length(): number {
    return this.count
  }

  /** Mean of the valid samples, or 0 if empty. */
  mean(): number {
    if (this.count === 0) return 0
    let sum = 0
    for (const v of this.toArrays().values) sum += v
    return sum / this.count
  }

  /** Oldest-first copy as plain arrays. */
  toArrays(): { values: number[]; timestamps: number[] } {
    const n = this.count
    const values: number[] = new Array(n)
    const ts: number[] = new Array(n)
    const start = (this.head - n + this.capacity) % this.capacity
    for (let i = 0; i < n; i++) {
      const idx = (start + i) % this.capacity
      values[i] = this.buf[idx]
      ts[i] = this.timestamps[idx]
    }
    return { values, timestamps: ts }
  }
}
