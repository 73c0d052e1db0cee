/**
 * Single source of truth for all eye engine tunable values.
 *
 * Durations are seconds, sizes are pixels, coverage values are fractions of
 * the eye height.
 */

// ═══════════════════════════════════════════════════════════════════
// DISPLAY
// ═══════════════════════════════════════════════════════════════════
export const DEFAULT_SCREEN_W = 128
export const DEFAULT_SCREEN_H = 64
export const FG_COLOR: RGB = [255, 255, 255]
export const BG_COLOR: RGB = [0, 0, 0]

// ═══════════════════════════════════════════════════════════════════
// EYE GEOMETRY
// ═══════════════════════════════════════════════════════════════════
export const EYE_WIDTH = 36
export const EYE_HEIGHT = 36
export const EYE_CORNER_R = 8
export const EYE_SPACING = 10
export const MIN_EYE_SIZE = 4

// ═══════════════════════════════════════════════════════════════════
// CURIOUS MODE
// ═══════════════════════════════════════════════════════════════════
export const CURIOUS_OUTER_SCALE = 1.4
export const CURIOUS_INNER_SCALE = 0.6

// ═══════════════════════════════════════════════════════════════════
// SEEDED APPEARANCE (fractions of screen size)
// ═══════════════════════════════════════════════════════════════════
export const SEED_WIDTH_RANGE: [number, number] = [0.2, 0.35]
export const SEED_HEIGHT_RANGE: [number, number] = [0.4, 0.7]
export const SEED_SPACING_RANGE: [number, number] = [0.04, 0.15]
export const SEED_RADIUS_RANGE: [number, number] = [0.15, 0.35]

// ═══════════════════════════════════════════════════════════════════
// LID TIMING
// ═══════════════════════════════════════════════════════════════════
export const MAX_QUEUED_ITEMS = 16

// ═══════════════════════════════════════════════════════════════════
// IDLE BEHAVIOUR
// ═══════════════════════════════════════════════════════════════════
export const IDLE_LOOK_INTERVAL = 1.5
export const IDLE_LOOK_VARIATION = 2.5
export const IDLE_BLINK_INTERVAL = 2.0
export const IDLE_BLINK_VARIATION = 3.0

// ═══════════════════════════════════════════════════════════════════
// WAKEUP SEQUENCE
// ═══════════════════════════════════════════════════════════════════
export const WAKEUP_FIRST_PAUSE = 2.0
export const WAKEUP_SECOND_PAUSE = 1.0

// ═══════════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════════

export enum Mood {
  DEFAULT = 'default',
  HAPPY = 'happy',
  ANGRY = 'angry',
  TIRED = 'tired',
  SAD = 'sad',
  CURIOUS = 'curious',
}

export enum BlinkPhase {
  IDLE = 'idle',
  CLOSING = 'closing',
  CLOSED = 'closed',
  OPENING = 'opening',
}

export enum LookDirection {
  CENTER = 'C',
  TOP = 'T',
  BOTTOM = 'B',
  LEFT = 'L',
  RIGHT = 'R',
  TOP_LEFT = 'TL',
  TOP_RIGHT = 'TR',
  BOTTOM_LEFT = 'BL',
  BOTTOM_RIGHT = 'BR',
}

export enum Speed {
  SLOW = 'slow',
  MEDIUM = 'medium',
  FAST = 'fast',
}

export enum EyeSelector {
  BOTH = 'both',
  LEFT = 'left',
  RIGHT = 'right',
}

export type EyeSide = 'left' | 'right'
export const EYE_SIDES: readonly EyeSide[] = ['left', 'right']

export type EyeShape = 'rounded' | 'oval'
export type ColorMode = '1' | 'L' | 'RGB' | 'RGBA'
export const COLOR_MODES: readonly ColorMode[] = ['1', 'L', 'RGB', 'RGBA']

// ── Guards (raw values from the command boundary) ──────────────

function enumGuard<T extends string>(values: readonly T[]) {
  return (value: unknown): value is T =>
    typeof value === 'string' && values.some((v) => v === value)
}

export const isLookDirection = enumGuard(Object.values(LookDirection))
export const isSpeed = enumGuard(Object.values(Speed))
export const isEyeSelector = enumGuard(Object.values(EyeSelector))
export const isColorMode = enumGuard(COLOR_MODES)

// ═══════════════════════════════════════════════════════════════════
// DIRECTION + SPEED TABLES
// ═══════════════════════════════════════════════════════════════════

/** Unit step per direction; y grows downwards. */
export const DIRECTION_VECTORS: Record<LookDirection, [number, number]> = {
  [LookDirection.CENTER]: [0, 0],
  [LookDirection.TOP]: [0, -1],
  [LookDirection.BOTTOM]: [0, 1],
  [LookDirection.LEFT]: [-1, 0],
  [LookDirection.RIGHT]: [1, 0],
  [LookDirection.TOP_LEFT]: [-1, -1],
  [LookDirection.TOP_RIGHT]: [1, -1],
  [LookDirection.BOTTOM_LEFT]: [-1, 1],
  [LookDirection.BOTTOM_RIGHT]: [1, 1],
}

export const LOOK_DURATIONS: Record<Speed, number> = {
  [Speed.SLOW]: 0.8,
  [Speed.MEDIUM]: 0.5,
  [Speed.FAST]: 0.3,
}

export interface LidTiming {
  closing: number
  closed: number
  opening: number
}

export const LID_TIMINGS: Record<Speed, LidTiming> = {
  [Speed.SLOW]: { closing: 0.24, closed: 0.1, opening: 0.24 },
  [Speed.MEDIUM]: { closing: 0.12, closed: 0.06, opening: 0.12 },
  [Speed.FAST]: { closing: 0.08, closed: 0.04, opening: 0.08 },
}

// ═══════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════
export type RGB = [number, number, number]
