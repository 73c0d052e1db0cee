/**
 * SDF (Signed Distance Field) primitive library.
 *
 * All functions return float: negative = inside shape, positive = outside.
 */

export function sdRoundedBox(
  px: number,
  py: number,
  cx: number,
  cy: number,
  hw: number,
  hh: number,
  r: number,
): number {
  const dx = Math.abs(px - cx) - hw + r
  const dy = Math.abs(py - cy) - hh + r
  return (
    Math.min(Math.max(dx, dy), 0.0) + Math.sqrt(Math.max(dx, 0.0) ** 2 + Math.max(dy, 0.0) ** 2) - r
  )
}

/**
 * Ellipse distance approximation (exact sign, first-order magnitude).
 * Good enough for hard-edged pixel tests.
 */
export function sdEllipse(
  px: number,
  py: number,
  cx: number,
  cy: number,
  rx: number,
  ry: number,
): number {
  const nx = (px - cx) / rx
  const ny = (py - cy) / ry
  const k = Math.sqrt(nx * nx + ny * ny)
  return (k - 1.0) * Math.min(rx, ry)
}

export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x))
}

export function clamp01(x: number): number {
  return clamp(x, 0.0, 1.0)
}
