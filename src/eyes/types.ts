/**
 * Eye engine type definitions + factory functions.
 */

import type {
  BlinkPhase,
  ColorMode,
  EyeSelector,
  EyeShape,
  EyeSide,
  LookDirection,
  Mood,
  RGB,
  Speed,
} from './constants'
import type { Logger } from '../lib/log'

export interface Point {
  x: number
  y: number
}

/** Axis-aligned box, top-left origin. */
export interface Rect {
  x: number
  y: number
  w: number
  h: number
}

// ── Configuration ──────────────────────────────────────────────

export interface ScreenConfig {
  width: number
  height: number
  mode: ColorMode
  hOffset: number
  vOffset: number
  rotate: number
}

export interface EyeDefaults {
  width: number
  height: number
  spacing: number
  cornerRadius: number
  shape: EyeShape
  color: RGB
  background: RGB
}

export interface EyeSizeOverride {
  width?: number
  height?: number
  roundness?: number
}

/** Persisted per-unit appearance. Any field present is used verbatim. */
export interface UnitOverride {
  spacing?: number
  left?: EyeSizeOverride
  right?: EyeSizeOverride
}

export interface IdleConfig {
  enabled: boolean
  seed: number
}

export interface EyeConfig {
  defaults: EyeDefaults
  unit?: UnitOverride
  seed?: string | number
  idle?: IdleConfig
}

export interface EyeParams {
  width: number
  height: number
  cornerRadius: number
}

export type ParamSource = 'override' | 'seed' | 'defaults'

export interface ResolvedEyeParams {
  left: EyeParams
  right: EyeParams
  spacing: number
  shape: EyeShape
  color: RGB
  background: RGB
  source: ParamSource
}

// ── Eye model ──────────────────────────────────────────────────

export type CuriousRole = 'outer' | 'inner' | 'neutral'

export interface EyeModel {
  side: EyeSide
  shape: EyeShape
  home: Point
  center: Point
  baseWidth: number
  baseHeight: number
  baseCornerRadius: number
  width: number
  height: number
  cornerRadius: number
  eyelidTop: number
  eyelidBottom: number
  eyelidSlope: number
  restTop: number
  restBottom: number
  /** Top lid is under control of an in-flight lid step. */
  lidLocked: boolean
  shut: boolean
  curiousFactor: number
  /** Upper bound on the current size: the screen the eye is drawn on. */
  maxWidth: number
  maxHeight: number
}

// ── Animation state ────────────────────────────────────────────

export type LidStepKind = 'blink' | 'close' | 'open'

export interface LidStep {
  kind: LidStepKind
  speed: Speed
  selector: EyeSelector
}

export type QueueItem =
  | { type: 'lid'; step: LidStep }
  | { type: 'pause'; seconds: number }
  | { type: 'mood'; mood: Mood }
  | { type: 'shut'; selector: EyeSelector }

export interface LidAnim {
  step: LidStep
  sides: EyeSide[]
  /** Phases still to run, in order; the head is the active one. */
  phases: BlinkPhase[]
  elapsed: number
  /** Top coverage per eye when the active phase began. */
  from: Record<EyeSide, number>
}

export interface LookAnim {
  start: Point
  target: Point
  duration: number
  elapsed: number
}

export interface IdleTimers {
  enabled: boolean
  clock: number
  nextLook: number
  nextBlink: number
}

/** Maps linear progress in [0, 1] to eased progress in [0, 1]. */
export type Easing = (t: number) => number

export interface EyesState {
  screen: ScreenConfig
  params: ResolvedEyeParams
  left: EyeModel
  right: EyeModel

  mood: Mood
  blinkPhase: BlinkPhase
  lookTarget: LookDirection | null
  lookSpeed: Speed
  /** Latest requested direction, kept after the look settles. */
  gaze: LookDirection
  eyeSelector: EyeSelector
  curious: boolean
  offset: Point

  lid: LidAnim | null
  look: LookAnim | null
  pause: number
  queue: QueueItem[]
  idle: IdleTimers
  random: () => number
  easing: Easing
  log: Logger
}

/** Observable summary published to the status store. */
export interface EyesStatus {
  mood: Mood
  blinkPhase: BlinkPhase
  lookTarget: LookDirection | null
  lookSpeed: Speed
  eyeSelector: EyeSelector
  curious: boolean
  idleBehaviour: boolean
  busy: boolean
  queued: number
  shut: Record<EyeSide, boolean>
}

export function createEyeModel(
  side: EyeSide,
  params: EyeParams,
  home: Point,
  shape: EyeShape,
  limit: { width: number; height: number } = { width: Infinity, height: Infinity },
): EyeModel {
  return {
    side,
    shape,
    home: { ...home },
    center: { ...home },
    baseWidth: params.width,
    baseHeight: params.height,
    baseCornerRadius: params.cornerRadius,
    width: Math.min(params.width, limit.width),
    height: Math.min(params.height, limit.height),
    cornerRadius: params.cornerRadius,
    eyelidTop: 0.0,
    eyelidBottom: 0.0,
    eyelidSlope: 0.0,
    restTop: 0.0,
    restBottom: 0.0,
    lidLocked: false,
    shut: false,
    curiousFactor: 1.0,
    maxWidth: limit.width,
    maxHeight: limit.height,
  }
}

export const linear: Easing = (t) => t

/** Sinusoidal ease-in-out. */
export const easeInOutSine: Easing = (t) => 0.5 * (1 - Math.cos(Math.PI * t))

export function defaultIdleTimers(): IdleTimers {
  return { enabled: false, clock: 0.0, nextLook: 0.0, nextBlink: 0.0 }
}

