/**
 * Per-mood eyelid shapes.
 */

import { Mood } from './constants'

/** Resting lids for a mood: top/bottom coverage plus top-lid tilt. */
export interface MoodShape {
  top: number
  bottom: number
  /** > 0 drops the inner corner, < 0 drops the outer corner. */
  slope: number
}

// Neutral baseline
export const NEUTRAL_SHAPE: MoodShape = { top: 0.0, bottom: 0.0, slope: 0.0 }

export const MOOD_SHAPES: Record<Mood, MoodShape> = {
  [Mood.DEFAULT]: NEUTRAL_SHAPE,
  [Mood.HAPPY]: { top: 0.0, bottom: 0.5, slope: 0.0 },
  [Mood.ANGRY]: { top: 0.25, bottom: 0.0, slope: 0.25 },
  [Mood.TIRED]: { top: 0.25, bottom: 0.0, slope: -0.25 },
  [Mood.SAD]: { top: 0.2, bottom: 0.1, slope: -0.2 },
  [Mood.CURIOUS]: { top: 0.1, bottom: 0.15, slope: 0.0 },
}

export const MOODS: readonly Mood[] = Object.values(Mood)

export function isMood(value: unknown): value is Mood {
  return typeof value === 'string' && MOODS.some((m) => m === value)
}
