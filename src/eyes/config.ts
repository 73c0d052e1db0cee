/**
 * Configuration resolver: defaults → seeded appearance → per-unit override,
 * clamped to what the screen can show.
 *
 * Raw parsing accepts the plain objects an external TOML loader produces
 * (snake_case keys, `distance`/`roundness` naming) and validates them.
 */

import { taggedLogger, type Logger } from '../lib/log'
import {
  BG_COLOR,
  type ColorMode,
  DEFAULT_SCREEN_H,
  DEFAULT_SCREEN_W,
  EYE_CORNER_R,
  EYE_HEIGHT,
  EYE_SPACING,
  EYE_WIDTH,
  type EyeShape,
  FG_COLOR,
  isColorMode,
  MIN_EYE_SIZE,
  type RGB,
  SEED_HEIGHT_RANGE,
  SEED_RADIUS_RANGE,
  SEED_SPACING_RANGE,
  SEED_WIDTH_RANGE,
} from './constants'
import { ConfigError, type ConfigOutOfBounds } from './errors'
import { hashSeed, makePrng, pickInRange } from './prng'
import { clamp } from './sdf'
import type {
  EyeConfig,
  EyeDefaults,
  EyeParams,
  EyeSizeOverride,
  IdleConfig,
  ParamSource,
  Point,
  ResolvedEyeParams,
  ScreenConfig,
  UnitOverride,
} from './types'

export const DEFAULT_SCREEN_CONFIG: ScreenConfig = {
  width: DEFAULT_SCREEN_W,
  height: DEFAULT_SCREEN_H,
  mode: '1',
  hOffset: 0,
  vOffset: 0,
  rotate: 0,
}

export const DEFAULT_EYE_DEFAULTS: EyeDefaults = {
  width: EYE_WIDTH,
  height: EYE_HEIGHT,
  spacing: EYE_SPACING,
  cornerRadius: EYE_CORNER_R,
  shape: 'rounded',
  color: FG_COLOR,
  background: BG_COLOR,
}

export interface ResolvedConfig {
  params: ResolvedEyeParams
  issues: ConfigOutOfBounds[]
}

// ── Seeded appearance ──────────────────────────────────────────

interface Layout {
  spacing: number
  left: EyeParams
  right: EyeParams
}

/** Same seed + same screen ⇒ same layout. */
export function deriveSeededLayout(seed: string | number, screen: ScreenConfig): Layout {
  const rand = makePrng(hashSeed(seed))
  const width = Math.round(pickInRange(SEED_WIDTH_RANGE, rand()) * screen.width)
  const height = Math.round(pickInRange(SEED_HEIGHT_RANGE, rand()) * screen.height)
  const spacing = Math.round(pickInRange(SEED_SPACING_RANGE, rand()) * screen.width)
  const cornerRadius = Math.round(pickInRange(SEED_RADIUS_RANGE, rand()) * Math.min(width, height))
  const eye = { width, height, cornerRadius }
  return { spacing, left: { ...eye }, right: { ...eye } }
}

function hasOverride(unit: UnitOverride | undefined): unit is UnitOverride {
  if (unit === undefined) return false
  const sized = (o: EyeSizeOverride | undefined) =>
    o !== undefined && (o.width !== undefined || o.height !== undefined || o.roundness !== undefined)
  return unit.spacing !== undefined || sized(unit.left) || sized(unit.right)
}

function overrideEye(base: EyeParams, o: EyeSizeOverride | undefined): EyeParams {
  return {
    width: o?.width ?? base.width,
    height: o?.height ?? base.height,
    cornerRadius: o?.roundness ?? base.cornerRadius,
  }
}

// ── Resolution ─────────────────────────────────────────────────

export function resolveEyeConfig(
  screen: ScreenConfig,
  config: EyeConfig,
  logger: Logger = taggedLogger('EyeConfig'),
): ResolvedConfig {
  const d = config.defaults
  const issues: ConfigOutOfBounds[] = []

  let source: ParamSource = 'defaults'
  let layout: Layout = {
    spacing: d.spacing,
    left: { width: d.width, height: d.height, cornerRadius: d.cornerRadius },
    right: { width: d.width, height: d.height, cornerRadius: d.cornerRadius },
  }

  if (hasOverride(config.unit)) {
    const unit = config.unit
    layout = {
      spacing: unit.spacing ?? layout.spacing,
      left: overrideEye(layout.left, unit.left),
      right: overrideEye(layout.right, unit.right),
    }
    source = 'override'
  } else if (config.seed !== undefined) {
    layout = deriveSeededLayout(config.seed, screen)
    source = 'seed'
  }

  const bound = (field: string, value: number, lo: number, hi: number): number => {
    const applied = clamp(value, lo, hi)
    if (applied !== value) {
      issues.push({ kind: 'ConfigOutOfBounds', field, requested: value, applied })
      logger.warn(`${field}=${value} out of bounds for ${screen.width}x${screen.height}, using ${applied}`)
    }
    return applied
  }

  const spacing = bound('spacing', layout.spacing, 0, Math.max(0, screen.width - 2 * MIN_EYE_SIZE))
  const maxW = Math.max(MIN_EYE_SIZE, Math.floor((screen.width - spacing) / 2))
  const maxH = Math.max(MIN_EYE_SIZE, screen.height)
  const fit = (side: 'left' | 'right', p: EyeParams): EyeParams => {
    const width = bound(`${side}.width`, p.width, MIN_EYE_SIZE, maxW)
    const height = bound(`${side}.height`, p.height, MIN_EYE_SIZE, maxH)
    const cornerRadius = bound(`${side}.roundness`, p.cornerRadius, 0, Math.min(width, height) / 2)
    return { width, height, cornerRadius }
  }

  const params: ResolvedEyeParams = {
    left: fit('left', layout.left),
    right: fit('right', layout.right),
    spacing,
    shape: d.shape,
    color: d.color,
    background: d.background,
    source,
  }
  logger.info(
    `eyes ${params.left.width}x${params.left.height} / ${params.right.width}x${params.right.height}, spacing ${spacing} (${source})`,
  )
  return { params, issues }
}

/** Resting centres: the pair sits mid-screen, `spacing` apart. */
export function homeCenters(
  screen: ScreenConfig,
  params: ResolvedEyeParams,
): { left: Point; right: Point } {
  const midX = screen.width / 2.0
  const midY = screen.height / 2.0
  return {
    left: { x: midX - params.spacing / 2.0 - params.left.width / 2.0, y: midY },
    right: { x: midX + params.spacing / 2.0 + params.right.width / 2.0, y: midY },
  }
}

// ── Raw parsing ────────────────────────────────────────────────

type RawRecord = Record<string, unknown>

function isRecord(v: unknown): v is RawRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function section(raw: RawRecord, key: string, path: string): RawRecord | undefined {
  const v = raw[key]
  if (v === undefined) return undefined
  if (!isRecord(v)) throw new ConfigError(`${path}.${key} must be a table`, `${path}.${key}`)
  return v
}

function optNumber(raw: RawRecord, key: string, path: string): number | undefined {
  const v = raw[key]
  if (v === undefined) return undefined
  if (typeof v !== 'number' || !Number.isFinite(v)) {
    throw new ConfigError(`${path}.${key} must be a finite number`, `${path}.${key}`)
  }
  return v
}

function optColor(raw: RawRecord, key: string, path: string): RGB | undefined {
  const v = raw[key]
  if (v === undefined) return undefined
  if (
    Array.isArray(v) &&
    v.length === 3 &&
    v.every((c) => typeof c === 'number' && Number.isInteger(c) && c >= 0 && c <= 255)
  ) {
    return [Number(v[0]), Number(v[1]), Number(v[2])]
  }
  throw new ConfigError(`${path}.${key} must be [r, g, b] with 0..255 integers`, `${path}.${key}`)
}

function optShape(raw: RawRecord, key: string, path: string): EyeShape | undefined {
  const v = raw[key]
  if (v === undefined) return undefined
  if (v === 'rounded' || v === 'oval') return v
  throw new ConfigError(`${path}.${key} must be "rounded" or "oval"`, `${path}.${key}`)
}

/** Parses the `[screen]` table. Missing keys fall back to the defaults. */
export function parseScreenConfig(raw: unknown): ScreenConfig {
  if (raw === undefined) return { ...DEFAULT_SCREEN_CONFIG }
  if (!isRecord(raw)) throw new ConfigError('screen must be a table', 'screen')
  const mode = raw.mode ?? DEFAULT_SCREEN_CONFIG.mode
  if (!isColorMode(mode)) {
    throw new ConfigError('screen.mode must be one of "1", "L", "RGB", "RGBA"', 'screen.mode')
  }
  const colorMode: ColorMode = mode
  const width = optNumber(raw, 'width', 'screen') ?? DEFAULT_SCREEN_CONFIG.width
  const height = optNumber(raw, 'height', 'screen') ?? DEFAULT_SCREEN_CONFIG.height
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ConfigError('screen width/height must be positive integers', 'screen')
  }
  return {
    width,
    height,
    mode: colorMode,
    hOffset: optNumber(raw, 'h_offset', 'screen') ?? 0,
    vOffset: optNumber(raw, 'v_offset', 'screen') ?? 0,
    rotate: optNumber(raw, 'rotate', 'screen') ?? 0,
  }
}

function parseSizeOverride(raw: RawRecord, key: string): EyeSizeOverride | undefined {
  const s = section(raw, key, 'eye')
  if (s === undefined) return undefined
  const path = `eye.${key}`
  return {
    width: optNumber(s, 'width', path),
    height: optNumber(s, 'height', path),
    roundness: optNumber(s, 'roundness', path),
  }
}

function parseIdle(raw: RawRecord): IdleConfig | undefined {
  const s = section(raw, 'idle', 'eye')
  if (s === undefined) return undefined
  const enabled = s.enabled ?? false
  if (typeof enabled !== 'boolean') throw new ConfigError('eye.idle.enabled must be a boolean', 'eye.idle.enabled')
  return { enabled, seed: optNumber(s, 'seed', 'eye.idle') ?? 0 }
}

/**
 * Parses the `[eye]` table. `distance`, `left` and `right` are the persisted
 * per-unit appearance; `defaults`, `shape` and colours shape the baseline.
 */
export function parseEyeConfig(raw: unknown): EyeConfig {
  if (raw === undefined) return { defaults: { ...DEFAULT_EYE_DEFAULTS } }
  if (!isRecord(raw)) throw new ConfigError('eye must be a table', 'eye')

  const base = section(raw, 'defaults', 'eye') ?? {}
  const defaults: EyeDefaults = {
    width: optNumber(base, 'width', 'eye.defaults') ?? DEFAULT_EYE_DEFAULTS.width,
    height: optNumber(base, 'height', 'eye.defaults') ?? DEFAULT_EYE_DEFAULTS.height,
    spacing: optNumber(base, 'spacing', 'eye.defaults') ?? DEFAULT_EYE_DEFAULTS.spacing,
    cornerRadius:
      optNumber(base, 'corner_radius', 'eye.defaults') ?? DEFAULT_EYE_DEFAULTS.cornerRadius,
    shape: optShape(raw, 'shape', 'eye') ?? DEFAULT_EYE_DEFAULTS.shape,
    color: optColor(raw, 'color', 'eye') ?? DEFAULT_EYE_DEFAULTS.color,
    background: optColor(raw, 'background', 'eye') ?? DEFAULT_EYE_DEFAULTS.background,
  }

  const unit: UnitOverride = {
    spacing: optNumber(raw, 'distance', 'eye'),
    left: parseSizeOverride(raw, 'left'),
    right: parseSizeOverride(raw, 'right'),
  }

  let seed: string | number | undefined
  if (typeof raw.seed === 'string' || typeof raw.seed === 'number') {
    seed = raw.seed
  } else if (raw.seed !== undefined) {
    throw new ConfigError('eye.seed must be a string or number', 'eye.seed')
  }

  return { defaults, unit, seed, idle: parseIdle(raw) }
}
