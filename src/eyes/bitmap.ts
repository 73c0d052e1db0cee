import type { ColorMode, RGB } from './constants'
import type { ScreenConfig } from './types'

const CHANNELS: Record<ColorMode, number> = {
  '1': 1,
  L: 1,
  RGB: 3,
  RGBA: 4,
}

/**
 * Fixed-size frame handed to the display transport.
 * Mode '1' stores one byte per pixel holding 0 or 1.
 * `hOffset`, `vOffset` and `rotate` are not applied to `data`; the transport
 * reads them when it pushes the frame to the panel.
 */
export class Bitmap {
  readonly channels: number
  readonly data: Uint8Array

  constructor(
    readonly width: number,
    readonly height: number,
    readonly mode: ColorMode = '1',
    readonly hOffset = 0,
    readonly vOffset = 0,
    readonly rotate = 0,
  ) {
    this.channels = CHANNELS[mode]
    this.data = new Uint8Array(width * height * this.channels)
  }

  static forScreen(screen: ScreenConfig): Bitmap {
    return new Bitmap(
      screen.width,
      screen.height,
      screen.mode,
      screen.hOffset,
      screen.vOffset,
      screen.rotate,
    )
  }

  /** Encoded bytes for a colour in this bitmap's mode. */
  encode([r, g, b]: RGB): number[] {
    switch (this.mode) {
      case '1':
        return [r | g | b ? 1 : 0]
      case 'L':
        return [Math.round(0.299 * r + 0.587 * g + 0.114 * b)]
      case 'RGB':
        return [r, g, b]
      case 'RGBA':
        return [r, g, b, 255]
    }
  }

  fill(color: RGB): void {
    const px = this.encode(color)
    const n = this.width * this.height
    for (let i = 0; i < n; i++) {
      const off = i * this.channels
      for (let c = 0; c < this.channels; c++) this.data[off + c] = px[c]
    }
  }

  /** Writes pre-encoded bytes; out-of-range coordinates are clipped. */
  setPx(x: number, y: number, px: readonly number[]): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return
    const off = (y * this.width + x) * this.channels
    for (let c = 0; c < this.channels; c++) this.data[off + c] = px[c]
  }

  /** First channel at (x, y), or -1 outside the frame. */
  getPx(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return -1
    return this.data[(y * this.width + x) * this.channels]
  }

  equals(other: Bitmap): boolean {
    if (
      other.width !== this.width ||
      other.height !== this.height ||
      other.mode !== this.mode ||
      other.data.length !== this.data.length
    )
      return false
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false
    }
    return true
  }
}
