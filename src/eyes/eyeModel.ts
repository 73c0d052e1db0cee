/**
 * Per-eye mutations: size, curious scaling, mood lids, bounds.
 *
 * Current size is always derived from the base size and the active curious
 * factor, never accumulated, so toggling restores the base exactly. It is
 * capped at the eye's max size so a scaled eye still fits the screen.
 */

import { CURIOUS_INNER_SCALE, CURIOUS_OUTER_SCALE, type Mood } from './constants'
import { MOOD_SHAPES } from './moods'
import { clamp, clamp01 } from './sdf'
import type { CuriousRole, EyeModel, ScreenConfig } from './types'

function curiousFactorFor(active: boolean, role: CuriousRole): number {
  if (!active) return 1.0
  if (role === 'outer') return CURIOUS_OUTER_SCALE
  if (role === 'inner') return CURIOUS_INNER_SCALE
  return 1.0
}

function resize(eye: EyeModel): void {
  const f = eye.curiousFactor
  eye.width = Math.min(f === 1.0 ? eye.baseWidth : eye.baseWidth * f, eye.maxWidth)
  eye.height = Math.min(f === 1.0 ? eye.baseHeight : eye.baseHeight * f, eye.maxHeight)
  const r = f === 1.0 ? eye.baseCornerRadius : eye.baseCornerRadius * f
  eye.cornerRadius = clamp(r, 0.0, Math.min(eye.width, eye.height) / 2.0)
}

export function setBaseSize(eye: EyeModel, width: number, height: number): void {
  eye.baseWidth = Math.max(0, width)
  eye.baseHeight = Math.max(0, height)
  resize(eye)
}

/**
 * Scale for curious mode. Returns false when the factor is already in effect.
 */
export function applyCuriousScale(
  eye: EyeModel,
  active: boolean,
  role: CuriousRole = 'neutral',
): boolean {
  const f = curiousFactorFor(active, role)
  if (f === eye.curiousFactor) return false
  eye.curiousFactor = f
  resize(eye)
  return true
}

/** Top coverage the lids rest at: 1 while the eye is held shut. */
export function restingTop(eye: EyeModel): number {
  return eye.shut ? 1.0 : eye.restTop
}

export function applyMoodShape(eye: EyeModel, mood: Mood): void {
  const shape = MOOD_SHAPES[mood]
  eye.restTop = shape.top
  eye.restBottom = shape.bottom
  eye.eyelidSlope = shape.slope
  eye.eyelidBottom = shape.bottom
  // an in-flight lid step owns the top lid and lands on the new rest itself
  if (!eye.lidLocked) eye.eyelidTop = restingTop(eye)
}

export function setEyelidCoverage(eye: EyeModel, top: number, bottom: number): void {
  eye.eyelidTop = clamp01(top)
  eye.eyelidBottom = clamp01(bottom)
}

/** Top-lid coverage at the inner and outer edges after tilt. */
export function lidEdges(eye: EyeModel): { inner: number; outer: number } {
  return {
    inner: clamp01(eye.eyelidTop + eye.eyelidSlope),
    outer: clamp01(eye.eyelidTop - eye.eyelidSlope),
  }
}

/** Keeps the eye box inside the screen; centres it when it cannot fit. */
export function clampToBounds(eye: EyeModel, screen: ScreenConfig): void {
  const hw = eye.width / 2.0
  const hh = eye.height / 2.0
  eye.center.x = hw * 2 > screen.width ? screen.width / 2.0 : clamp(eye.center.x, hw, screen.width - hw)
  eye.center.y =
    hh * 2 > screen.height ? screen.height / 2.0 : clamp(eye.center.y, hh, screen.height - hh)
}
