/**
 * Eye renderer: draws both eyes, lids included, into a Bitmap.
 *
 * Hard-edged, pixel-centre sampled. Reads state only.
 */

import type { Bitmap } from './bitmap'
import { EYE_SIDES } from './constants'
import { lidEdges } from './eyeModel'
import { fillEllipse, fillPolygon, fillRect, fillRoundedRect, isDegenerate } from './geometry'
import type { EyeModel, EyesState, Rect } from './types'

/** Integer box the eye is drawn into. */
export function eyeBox(eye: EyeModel): Rect {
  return {
    x: Math.round(eye.center.x - eye.width / 2.0),
    y: Math.round(eye.center.y - eye.height / 2.0),
    w: Math.round(eye.width),
    h: Math.round(eye.height),
  }
}

// ── Lids ───────────────────────────────────────────────────────

/** Top lid as a quad; the inner edge faces the other eye. */
function topLidPolygon(eye: EyeModel, box: Rect): { x: number; y: number }[] {
  const { inner, outer } = lidEdges(eye)
  const innerDepth = Math.round(inner * box.h)
  const outerDepth = Math.round(outer * box.h)
  const leftDepth = eye.side === 'left' ? outerDepth : innerDepth
  const rightDepth = eye.side === 'left' ? innerDepth : outerDepth
  const x1 = box.x + box.w
  return [
    { x: box.x, y: box.y },
    { x: x1, y: box.y },
    { x: x1, y: box.y + rightDepth },
    { x: box.x, y: box.y + leftDepth },
  ]
}

function bottomLidRect(eye: EyeModel, box: Rect): Rect {
  const depth = Math.round(eye.eyelidBottom * box.h)
  return { x: box.x, y: box.y + box.h - depth, w: box.w, h: depth }
}

// ── Eye rendering ──────────────────────────────────────────────

function renderEye(bm: Bitmap, es: EyesState, eye: EyeModel): void {
  const box = eyeBox(eye)
  if (isDegenerate(box)) return
  const { color, background } = es.params

  if (eye.shape === 'oval') {
    fillEllipse(bm, box, color)
  } else {
    fillRoundedRect(bm, box, eye.cornerRadius, color)
  }

  fillPolygon(bm, topLidPolygon(eye, box), background)
  // no-op at zero depth
  fillRect(bm, bottomLidRect(eye, box), background)
}

// ── Main render entry point ────────────────────────────────────

export function renderEyes(es: EyesState, bitmap: Bitmap): void {
  bitmap.fill(es.params.background)
  for (const side of EYE_SIDES) renderEye(bitmap, es, es[side])
}
