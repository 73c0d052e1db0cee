/**
 * Command bridge: maps raw command packets from the host to EyesState changes.
 *
 * Packets are plain objects such as `{ cmd: 'look', direction: 'TR', speed: 'slow' }`.
 * Keys and enum values are matched case-insensitively.
 */

import {
  EyeSelector,
  isEyeSelector,
  isLookDirection,
  isSpeed,
  LookDirection,
  type Mood,
  Speed,
} from './constants'
import { InvalidCommandError } from './errors'
import { isMood } from './moods'
import {
  eyesBlink,
  eyesClose,
  eyesLook,
  eyesOpen,
  eyesSetCurious,
  eyesSetIdle,
  eyesSetMood,
  eyesWakeup,
} from './state'
import type { EyesState } from './types'

export type EyeCommand =
  | { cmd: 'look'; direction: LookDirection; speed: Speed }
  | { cmd: 'blink'; speed: Speed; eye: EyeSelector }
  | { cmd: 'close'; speed: Speed; eye: EyeSelector }
  | { cmd: 'open'; speed: Speed; eye: EyeSelector }
  | { cmd: 'set_mood'; mood: Mood }
  | { cmd: 'set_curious'; active: boolean }
  | { cmd: 'set_idle'; enabled: boolean }
  | { cmd: 'wakeup' }

export type CommandResult = { ok: true; command: EyeCommand } | { ok: false; error: InvalidCommandError }

// Long-form direction names accepted alongside the short codes
const DIRECTION_ALIASES: Record<string, LookDirection> = {
  CENTER: LookDirection.CENTER,
  CENTRE: LookDirection.CENTER,
  TOP: LookDirection.TOP,
  UP: LookDirection.TOP,
  BOTTOM: LookDirection.BOTTOM,
  DOWN: LookDirection.BOTTOM,
  LEFT: LookDirection.LEFT,
  RIGHT: LookDirection.RIGHT,
  TOP_LEFT: LookDirection.TOP_LEFT,
  TOP_RIGHT: LookDirection.TOP_RIGHT,
  BOTTOM_LEFT: LookDirection.BOTTOM_LEFT,
  BOTTOM_RIGHT: LookDirection.BOTTOM_RIGHT,
}

const CMD_ALIASES: Record<string, EyeCommand['cmd']> = {
  look: 'look',
  blink: 'blink',
  close: 'close',
  open: 'open',
  mood: 'set_mood',
  face: 'set_mood',
  set_mood: 'set_mood',
  set_face: 'set_mood',
  curious: 'set_curious',
  set_curious: 'set_curious',
  idle: 'set_idle',
  set_idle: 'set_idle',
  wakeup: 'wakeup',
}

type RawPacket = Record<string, unknown>

function isPacket(v: unknown): v is RawPacket {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function lower(v: unknown): unknown {
  return typeof v === 'string' ? v.trim().toLowerCase() : v
}

function parseDirection(v: unknown): LookDirection {
  if (v === undefined) return LookDirection.CENTER
  if (typeof v === 'string') {
    const key = v.trim().toUpperCase().replace(/[\s-]+/g, '_')
    if (isLookDirection(key)) return key
    if (Object.hasOwn(DIRECTION_ALIASES, key)) return DIRECTION_ALIASES[key]
  }
  throw new InvalidCommandError(`unknown direction: ${String(v)}`, 'direction', v)
}

function parseSpeed(v: unknown, fallback: Speed): Speed {
  if (v === undefined) return fallback
  const s = lower(v)
  if (isSpeed(s)) return s
  throw new InvalidCommandError(`unknown speed: ${String(v)}`, 'speed', v)
}

function parseSelector(v: unknown): EyeSelector {
  if (v === undefined) return EyeSelector.BOTH
  const s = lower(v)
  if (isEyeSelector(s)) return s
  throw new InvalidCommandError(`unknown eye selector: ${String(v)}`, 'eye', v)
}

function parseMood(v: unknown): Mood {
  const s = lower(v)
  if (isMood(s)) return s
  throw new InvalidCommandError(`unknown mood: ${String(v)}`, 'mood', v)
}

function parseFlag(v: unknown, field: string): boolean {
  if (typeof v === 'boolean') return v
  if (v === 0 || v === 1) return v === 1
  const s = lower(v)
  if (s === 'on' || s === 'true') return true
  if (s === 'off' || s === 'false') return false
  throw new InvalidCommandError(`${field} must be a boolean, got ${String(v)}`, field, v)
}

/** Validates a raw packet. Throws InvalidCommandError on anything unrecognised. */
export function parseCommand(raw: unknown): EyeCommand {
  if (!isPacket(raw)) throw new InvalidCommandError('command must be an object', 'cmd', raw)
  const name = lower(raw.cmd ?? raw.command)
  const cmd = typeof name === 'string' && Object.hasOwn(CMD_ALIASES, name) ? CMD_ALIASES[name] : undefined
  if (cmd === undefined) throw new InvalidCommandError(`unknown command: ${String(name)}`, 'cmd', name)

  switch (cmd) {
    case 'look':
      return {
        cmd,
        direction: parseDirection(raw.direction),
        speed: parseSpeed(raw.speed, Speed.FAST),
      }
    case 'blink':
    case 'close':
    case 'open':
      return { cmd, speed: parseSpeed(raw.speed, Speed.MEDIUM), eye: parseSelector(raw.eye) }
    case 'set_mood':
      return { cmd, mood: parseMood(raw.mood ?? raw.face) }
    case 'set_curious':
      return { cmd, active: parseFlag(raw.active ?? raw.curious, 'curious') }
    case 'set_idle':
      return { cmd, enabled: parseFlag(raw.enabled ?? raw.idle, 'idle') }
    case 'wakeup':
      return { cmd }
  }
}

export function applyCommand(es: EyesState, command: EyeCommand): void {
  switch (command.cmd) {
    case 'look':
      eyesLook(es, command.direction, command.speed)
      return
    case 'blink':
      eyesBlink(es, command.speed, command.eye)
      return
    case 'close':
      eyesClose(es, command.speed, command.eye)
      return
    case 'open':
      eyesOpen(es, command.speed, command.eye)
      return
    case 'set_mood':
      eyesSetMood(es, command.mood)
      return
    case 'set_curious':
      eyesSetCurious(es, command.active)
      return
    case 'set_idle':
      eyesSetIdle(es, command.enabled)
      return
    case 'wakeup':
      eyesWakeup(es)
  }
}

/**
 * Apply a raw command packet to the eye state.
 * Never throws for a rejected command; the error comes back in the result.
 */
export function applyCommandPacket(es: EyesState, raw: unknown): CommandResult {
  try {
    const command = parseCommand(raw)
    applyCommand(es, command)
    return { ok: true, command }
  } catch (err) {
    if (err instanceof InvalidCommandError) {
      es.log.warn(`rejected command: ${err.message}`)
      return { ok: false, error: err }
    }
    throw err
  }
}
