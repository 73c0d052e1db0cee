/**
 * Geometry primitives: hard-edged rasterizers and outline generators.
 *
 * Pixels are sampled at their centres (x + 0.5, y + 0.5). Degenerate input
 * (non-positive width/height, fewer than three vertices) draws nothing.
 */

import type { Bitmap } from './bitmap'
import type { RGB } from './constants'
import { clamp, sdEllipse, sdRoundedBox } from './sdf'
import type { Point, Rect } from './types'

export function isDegenerate(rect: Rect): boolean {
  return !(rect.w > 0 && rect.h > 0)
}

/** Row/column span of a rect clipped to the bitmap. */
function clipSpan(bm: Bitmap, rect: Rect): [number, number, number, number] {
  const x0 = Math.max(0, Math.floor(rect.x))
  const x1 = Math.min(bm.width, Math.ceil(rect.x + rect.w))
  const y0 = Math.max(0, Math.floor(rect.y))
  const y1 = Math.min(bm.height, Math.ceil(rect.y + rect.h))
  return [x0, x1, y0, y1]
}

export function fillRect(bm: Bitmap, rect: Rect, color: RGB): void {
  if (isDegenerate(rect)) return
  const px = bm.encode(color)
  const [x0, x1, y0, y1] = clipSpan(bm, rect)
  for (let y = y0; y < y1; y++) {
    const cy = y + 0.5
    if (cy < rect.y || cy >= rect.y + rect.h) continue
    for (let x = x0; x < x1; x++) {
      const cx = x + 0.5
      if (cx < rect.x || cx >= rect.x + rect.w) continue
      bm.setPx(x, y, px)
    }
  }
}

export function fillRoundedRect(bm: Bitmap, rect: Rect, radius: number, color: RGB): void {
  if (isDegenerate(rect)) return
  const px = bm.encode(color)
  const hw = rect.w / 2.0
  const hh = rect.h / 2.0
  const cx = rect.x + hw
  const cy = rect.y + hh
  const r = clamp(radius, 0.0, Math.min(hw, hh))
  const [x0, x1, y0, y1] = clipSpan(bm, rect)
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      if (sdRoundedBox(x + 0.5, y + 0.5, cx, cy, hw, hh, r) <= 0.0) bm.setPx(x, y, px)
    }
  }
}

export function fillEllipse(bm: Bitmap, rect: Rect, color: RGB): void {
  if (isDegenerate(rect)) return
  const px = bm.encode(color)
  const rx = rect.w / 2.0
  const ry = rect.h / 2.0
  const cx = rect.x + rx
  const cy = rect.y + ry
  const [x0, x1, y0, y1] = clipSpan(bm, rect)
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      if (sdEllipse(x + 0.5, y + 0.5, cx, cy, rx, ry) <= 0.0) bm.setPx(x, y, px)
    }
  }
}

/** Scanline fill, even-odd rule, half-open spans [left, right). */
export function fillPolygon(bm: Bitmap, vertices: readonly Point[], color: RGB): void {
  if (vertices.length < 3) return
  const px = bm.encode(color)

  let minY = Infinity
  let maxY = -Infinity
  for (const v of vertices) {
    minY = Math.min(minY, v.y)
    maxY = Math.max(maxY, v.y)
  }
  if (!(maxY > minY)) return

  const y0 = Math.max(0, Math.floor(minY))
  const y1 = Math.min(bm.height, Math.ceil(maxY))
  const xs: number[] = []

  for (let y = y0; y < y1; y++) {
    const sy = y + 0.5
    xs.length = 0
    for (let i = 0; i < vertices.length; i++) {
      const a = vertices[i]
      const b = vertices[(i + 1) % vertices.length]
      if ((a.y <= sy && sy < b.y) || (b.y <= sy && sy < a.y)) {
        xs.push(a.x + ((sy - a.y) * (b.x - a.x)) / (b.y - a.y))
      }
    }
    xs.sort((p, q) => p - q)
    for (let k = 0; k + 1 < xs.length; k += 2) {
      const from = Math.max(0, Math.ceil(xs[k] - 0.5))
      const to = Math.min(bm.width, Math.ceil(xs[k + 1] - 0.5))
      for (let x = from; x < to; x++) bm.setPx(x, y, px)
    }
  }
}

// ── Outlines ───────────────────────────────────────────────────

/**
 * Closed outline of a rounded rect, clockwise from the top edge.
 * The first point is repeated at the end.
 */
export function roundedRectPoints(rect: Rect, radius: number, segments = 4): Point[] {
  if (isDegenerate(rect)) return []
  const r = clamp(radius, 0.0, Math.min(rect.w, rect.h) / 2.0)
  const x1 = rect.x + rect.w
  const y1 = rect.y + rect.h
  // corner centres with their starting angle, clockwise in screen space
  const corners: Array<[number, number, number]> = [
    [x1 - r, rect.y + r, -Math.PI / 2],
    [x1 - r, y1 - r, 0],
    [rect.x + r, y1 - r, Math.PI / 2],
    [rect.x + r, rect.y + r, Math.PI],
  ]
  const pts: Point[] = []
  for (const [cx, cy, start] of corners) {
    if (r === 0) {
      pts.push({ x: cx, y: cy })
      continue
    }
    for (let i = 0; i <= segments; i++) {
      const a = start + ((Math.PI / 2) * i) / segments
      pts.push({ x: cx + Math.cos(a) * r, y: cy + Math.sin(a) * r })
    }
  }
  pts.push({ ...pts[0] })
  return pts
}

/** Closed outline of the ellipse inscribed in `rect`. */
export function ellipsePoints(rect: Rect, segments = 32): Point[] {
  if (isDegenerate(rect) || segments < 3) return []
  const rx = rect.w / 2.0
  const ry = rect.h / 2.0
  const cx = rect.x + rx
  const cy = rect.y + ry
  const pts: Point[] = []
  for (let i = 0; i < segments; i++) {
    const a = (2 * Math.PI * i) / segments
    pts.push({ x: cx + Math.cos(a) * rx, y: cy + Math.sin(a) * ry })
  }
  pts.push({ ...pts[0] })
  return pts
}
