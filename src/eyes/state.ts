/**
 * Eye animation state machine: commands and the per-tick update.
 *
 * Lid steps (blink / close / open), pauses and queued mood changes run one at
 * a time from a FIFO queue. Looks run alongside and replace each other.
 * Moods and curious mode apply instantly.
 */

import { taggedLogger, type Logger } from '../lib/log'
import {
  BlinkPhase,
  DIRECTION_VECTORS,
  EYE_SIDES,
  EyeSelector,
  type EyeSide,
  IDLE_BLINK_INTERVAL,
  IDLE_BLINK_VARIATION,
  IDLE_LOOK_INTERVAL,
  IDLE_LOOK_VARIATION,
  isEyeSelector,
  isLookDirection,
  isSpeed,
  LID_TIMINGS,
  LOOK_DURATIONS,
  LookDirection,
  MAX_QUEUED_ITEMS,
  Mood,
  Speed,
  WAKEUP_FIRST_PAUSE,
  WAKEUP_SECOND_PAUSE,
} from './constants'
import { homeCenters } from './config'
import { InvalidCommandError } from './errors'
import {
  applyCuriousScale,
  applyMoodShape,
  clampToBounds,
  restingTop,
  setBaseSize,
} from './eyeModel'
import { isMood } from './moods'
import { makePrng } from './prng'
import { clamp, clamp01 } from './sdf'
import {
  createEyeModel,
  defaultIdleTimers,
  type CuriousRole,
  type Easing,
  type EyeModel,
  type EyesState,
  type EyesStatus,
  type LidAnim,
  type LidStep,
  linear,
  type QueueItem,
  type ResolvedEyeParams,
  type ScreenConfig,
} from './types'

export interface EyesStateOptions {
  /** Source for idle behaviour; defaults to a PRNG seeded with 0. */
  random?: () => number
  easing?: Easing
  logger?: Logger
}

export function createEyesState(
  screen: ScreenConfig,
  params: ResolvedEyeParams,
  options: EyesStateOptions = {},
): EyesState {
  const homes = homeCenters(screen, params)
  const limit = { width: screen.width, height: screen.height }
  const es: EyesState = {
    screen,
    params,
    left: createEyeModel('left', params.left, homes.left, params.shape, limit),
    right: createEyeModel('right', params.right, homes.right, params.shape, limit),

    mood: Mood.DEFAULT,
    blinkPhase: BlinkPhase.IDLE,
    lookTarget: null,
    lookSpeed: Speed.MEDIUM,
    gaze: LookDirection.CENTER,
    eyeSelector: EyeSelector.BOTH,
    curious: false,
    offset: { x: 0.0, y: 0.0 },

    lid: null,
    look: null,
    pause: 0.0,
    queue: [],
    idle: defaultIdleTimers(),
    random: options.random ?? makePrng(0),
    easing: options.easing ?? linear,
    log: options.logger ?? taggedLogger('EyeAnimator'),
  }
  for (const side of EYE_SIDES) {
    applyMoodShape(es[side], es.mood)
    clampToBounds(es[side], screen)
  }
  return es
}

// ── Helpers ────────────────────────────────────────────────────

export function selectedSides(selector: EyeSelector): EyeSide[] {
  if (selector === EyeSelector.LEFT) return ['left']
  if (selector === EyeSelector.RIGHT) return ['right']
  return [...EYE_SIDES]
}

function eyes(es: EyesState): EyeModel[] {
  return EYE_SIDES.map((side) => es[side])
}

function assertMood(mood: unknown): asserts mood is Mood {
  if (!isMood(mood)) throw new InvalidCommandError(`unknown mood: ${String(mood)}`, 'mood', mood)
}

function assertSpeed(speed: unknown): asserts speed is Speed {
  if (!isSpeed(speed)) throw new InvalidCommandError(`unknown speed: ${String(speed)}`, 'speed', speed)
}

function assertSelector(selector: unknown): asserts selector is EyeSelector {
  if (!isEyeSelector(selector)) {
    throw new InvalidCommandError(`unknown eye selector: ${String(selector)}`, 'eye', selector)
  }
}

function assertDirection(direction: unknown): asserts direction is LookDirection {
  if (!isLookDirection(direction)) {
    throw new InvalidCommandError(`unknown direction: ${String(direction)}`, 'direction', direction)
  }
}

/** Places both eyes at home + shared offset, inside the screen. */
function syncCenters(es: EyesState): void {
  for (const eye of eyes(es)) {
    eye.center.x = eye.home.x + es.offset.x
    eye.center.y = eye.home.y + es.offset.y
    clampToBounds(eye, es.screen)
  }
}

/** Shared offset range that keeps both eye boxes on screen at current sizes. */
export function travelRange(es: EyesState): { minX: number; maxX: number; minY: number; maxY: number } {
  let minX = -Infinity
  let maxX = Infinity
  let minY = -Infinity
  let maxY = Infinity
  for (const eye of eyes(es)) {
    const hw = eye.width / 2.0
    const hh = eye.height / 2.0
    minX = Math.max(minX, hw - eye.home.x)
    maxX = Math.min(maxX, es.screen.width - hw - eye.home.x)
    minY = Math.max(minY, hh - eye.home.y)
    maxY = Math.min(maxY, es.screen.height - hh - eye.home.y)
  }
  // no room at all: settle in the middle of the impossible range
  if (minX > maxX) minX = maxX = (minX + maxX) / 2.0
  if (minY > maxY) minY = maxY = (minY + maxY) / 2.0
  return { minX, maxX, minY, maxY }
}

// ── Mood + curious ─────────────────────────────────────────────

function setMoodNow(es: EyesState, mood: Mood): void {
  es.mood = mood
  for (const eye of eyes(es)) applyMoodShape(eye, mood)
}

export function eyesSetMood(es: EyesState, mood: Mood): void {
  assertMood(mood)
  setMoodNow(es, mood)
  es.log.debug(`mood ${mood}`)
}

function curiousRoles(gaze: LookDirection): Record<EyeSide, CuriousRole> {
  const [dx] = DIRECTION_VECTORS[gaze]
  if (dx < 0) return { left: 'outer', right: 'inner' }
  if (dx > 0) return { left: 'inner', right: 'outer' }
  return { left: 'neutral', right: 'neutral' }
}

function applyCuriousRoles(es: EyesState): void {
  const roles = curiousRoles(es.gaze)
  let changed = false
  for (const side of EYE_SIDES) {
    if (applyCuriousScale(es[side], es.curious, roles[side])) changed = true
  }
  if (changed) syncCenters(es)
}

export function eyesSetCurious(es: EyesState, active: boolean): void {
  if (typeof active !== 'boolean') {
    throw new InvalidCommandError(`curious must be a boolean, got ${String(active)}`, 'curious', active)
  }
  es.curious = active
  applyCuriousRoles(es)
}

export function eyesSetBaseSize(
  es: EyesState,
  selector: EyeSelector,
  width: number,
  height: number,
): void {
  assertSelector(selector)
  if (!Number.isFinite(width) || !Number.isFinite(height)) {
    throw new InvalidCommandError('size must be finite', 'size', [width, height])
  }
  for (const side of selectedSides(selector)) setBaseSize(es[side], width, height)
  syncCenters(es)
}

// ── Look ───────────────────────────────────────────────────────

export function eyesLook(es: EyesState, direction: LookDirection, speed: Speed): void {
  assertDirection(direction)
  assertSpeed(speed)

  es.gaze = direction
  es.lookTarget = direction
  es.lookSpeed = speed
  applyCuriousRoles(es)

  const [dx, dy] = DIRECTION_VECTORS[direction]
  const r = travelRange(es)
  const target = {
    x: dx < 0 ? r.minX : dx > 0 ? r.maxX : clamp(0.0, r.minX, r.maxX),
    y: dy < 0 ? r.minY : dy > 0 ? r.maxY : clamp(0.0, r.minY, r.maxY),
  }
  es.look = { start: { ...es.offset }, target, duration: LOOK_DURATIONS[speed], elapsed: 0.0 }
  es.log.debug(`look ${direction} (${speed}) → offset ${target.x},${target.y}`)
}

function updateLook(es: EyesState, dt: number): void {
  const look = es.look
  if (look === null) return
  look.elapsed += dt
  const t = look.duration > 0 ? look.elapsed / look.duration : 1.0
  if (t >= 1.0) {
    es.offset = { ...look.target }
    es.look = null
    es.lookTarget = null
  } else {
    const k = es.easing(t)
    es.offset.x = look.start.x + (look.target.x - look.start.x) * k
    es.offset.y = look.start.y + (look.target.y - look.start.y) * k
  }
  syncCenters(es)
}

// ── Lid steps ──────────────────────────────────────────────────

function enqueue(es: EyesState, item: QueueItem): boolean {
  if (es.queue.length >= MAX_QUEUED_ITEMS) {
    es.log.warn(`queue full (${MAX_QUEUED_ITEMS}), dropping ${item.type}`)
    return false
  }
  es.queue.push(item)
  pump(es)
  return true
}

function lidCommand(es: EyesState, step: LidStep): void {
  assertSpeed(step.speed)
  assertSelector(step.selector)
  enqueue(es, { type: 'lid', step })
}

/** Queued behind any in-flight lid step; never interrupts one. */
export function eyesBlink(es: EyesState, speed: Speed, selector = EyeSelector.BOTH): void {
  lidCommand(es, { kind: 'blink', speed, selector })
}

export function eyesClose(es: EyesState, speed: Speed, selector = EyeSelector.BOTH): void {
  lidCommand(es, { kind: 'close', speed, selector })
}

export function eyesOpen(es: EyesState, speed: Speed, selector = EyeSelector.BOTH): void {
  lidCommand(es, { kind: 'open', speed, selector })
}

export function eyesWakeup(es: EyesState): void {
  const items: QueueItem[] = [
    { type: 'shut', selector: EyeSelector.BOTH },
    { type: 'mood', mood: Mood.TIRED },
    { type: 'pause', seconds: WAKEUP_FIRST_PAUSE },
    { type: 'lid', step: { kind: 'open', speed: Speed.SLOW, selector: EyeSelector.BOTH } },
    { type: 'lid', step: { kind: 'close', speed: Speed.SLOW, selector: EyeSelector.BOTH } },
    { type: 'pause', seconds: WAKEUP_SECOND_PAUSE },
    { type: 'lid', step: { kind: 'open', speed: Speed.MEDIUM, selector: EyeSelector.BOTH } },
    { type: 'lid', step: { kind: 'close', speed: Speed.MEDIUM, selector: EyeSelector.BOTH } },
    { type: 'lid', step: { kind: 'open', speed: Speed.FAST, selector: EyeSelector.BOTH } },
    { type: 'mood', mood: Mood.DEFAULT },
  ]
  if (es.queue.length + items.length > MAX_QUEUED_ITEMS) {
    es.log.warn('queue too full for wakeup, skipping')
    return
  }
  es.queue.push(...items)
  pump(es)
}

function phaseDuration(step: LidStep, phase: BlinkPhase): number {
  const timing = LID_TIMINGS[step.speed]
  if (phase === BlinkPhase.CLOSING) return timing.closing
  if (phase === BlinkPhase.CLOSED) return timing.closed
  if (phase === BlinkPhase.OPENING) return timing.opening
  return 0.0
}

function phasesFor(step: LidStep): BlinkPhase[] {
  if (step.kind === 'close') return [BlinkPhase.CLOSING]
  if (step.kind === 'open') return [BlinkPhase.OPENING]
  return [BlinkPhase.CLOSING, BlinkPhase.CLOSED, BlinkPhase.OPENING]
}

function beginPhase(es: EyesState, lid: LidAnim): void {
  lid.elapsed = 0.0
  for (const side of lid.sides) lid.from[side] = es[side].eyelidTop
  es.blinkPhase = lid.phases[0]
}

function startLid(es: EyesState, step: LidStep): void {
  let sides = selectedSides(step.selector)
  if (step.kind === 'open') {
    sides = sides.filter((side) => es[side].shut)
    if (sides.length === 0) {
      es.log.warn(`open ${step.selector}: already open, skipping`)
      return
    }
    for (const side of sides) es[side].shut = false
  }
  for (const side of sides) es[side].lidLocked = true
  const lid: LidAnim = {
    step,
    sides,
    phases: phasesFor(step),
    elapsed: 0.0,
    from: { left: es.left.eyelidTop, right: es.right.eyelidTop },
  }
  es.lid = lid
  es.eyeSelector = step.selector
  beginPhase(es, lid)
  es.log.debug(`${step.kind} ${step.selector} (${step.speed})`)
}

function finishLid(es: EyesState, lid: LidAnim): void {
  for (const side of lid.sides) {
    const eye = es[side]
    if (lid.step.kind === 'close') eye.shut = true
    eye.lidLocked = false
    eye.eyelidTop = restingTop(eye)
  }
  es.lid = null
  es.blinkPhase = BlinkPhase.IDLE
}

function applyLidProgress(es: EyesState, lid: LidAnim, phase: BlinkPhase, t: number): void {
  const done = t >= 1.0
  const k = done ? 1.0 : es.easing(t)
  for (const side of lid.sides) {
    const eye = es[side]
    const from = lid.from[side]
    if (phase === BlinkPhase.CLOSING) {
      eye.eyelidTop = done ? 1.0 : clamp01(from + (1.0 - from) * k)
    } else if (phase === BlinkPhase.CLOSED) {
      eye.eyelidTop = 1.0
    } else if (phase === BlinkPhase.OPENING) {
      const rest = restingTop(eye)
      eye.eyelidTop = done ? rest : clamp01(from + (rest - from) * k)
    }
  }
}

/** Runs the in-flight lid step for up to `dt`; returns unused time. */
function stepLid(es: EyesState, lid: LidAnim, dt: number): number {
  let remaining = dt
  while (lid.phases.length > 0) {
    const phase = lid.phases[0]
    const duration = phaseDuration(lid.step, phase)
    const left = duration - lid.elapsed
    if (remaining < left) {
      lid.elapsed += remaining
      applyLidProgress(es, lid, phase, lid.elapsed / duration)
      return 0.0
    }
    remaining -= left
    applyLidProgress(es, lid, phase, 1.0)
    lid.phases.shift()
    if (lid.phases.length > 0) beginPhase(es, lid)
  }
  finishLid(es, lid)
  return remaining
}

/** Starts queued items until one of them needs time to run. */
function pump(es: EyesState): void {
  while (es.lid === null && es.pause <= 0.0) {
    const item = es.queue.shift()
    if (item === undefined) return
    if (item.type === 'mood') {
      setMoodNow(es, item.mood)
    } else if (item.type === 'shut') {
      for (const side of selectedSides(item.selector)) {
        es[side].shut = true
        es[side].eyelidTop = 1.0
      }
    } else if (item.type === 'pause') {
      es.pause = item.seconds
    } else {
      startLid(es, item.step)
    }
  }
}

function advanceQueue(es: EyesState, dt: number): void {
  let remaining = dt
  pump(es)
  while (remaining > 0.0) {
    if (es.lid !== null) {
      remaining = stepLid(es, es.lid, remaining)
    } else if (es.pause > 0.0) {
      const used = Math.min(es.pause, remaining)
      es.pause -= used
      remaining -= used
    } else {
      break
    }
    pump(es)
  }
}

// ── Idle behaviour ─────────────────────────────────────────────

const IDLE_DIRECTIONS = Object.values(LookDirection)

export function eyesSetIdle(es: EyesState, enabled: boolean): void {
  const idle = es.idle
  if (idle.enabled === enabled) return
  idle.enabled = enabled
  if (enabled) {
    idle.nextLook = idle.clock + IDLE_LOOK_INTERVAL + es.random() * IDLE_LOOK_VARIATION
    idle.nextBlink = idle.clock + IDLE_BLINK_INTERVAL + es.random() * IDLE_BLINK_VARIATION
  }
}

function updateIdle(es: EyesState, dt: number): void {
  const idle = es.idle
  if (!idle.enabled) return
  idle.clock += dt

  if (idle.clock >= idle.nextLook && es.look === null) {
    const i = Math.min(IDLE_DIRECTIONS.length - 1, Math.floor(es.random() * IDLE_DIRECTIONS.length))
    eyesLook(es, IDLE_DIRECTIONS[i], Speed.SLOW)
    idle.nextLook = idle.clock + IDLE_LOOK_INTERVAL + es.random() * IDLE_LOOK_VARIATION
  }
  if (idle.clock >= idle.nextBlink && es.lid === null && es.queue.length === 0 && es.pause <= 0.0) {
    eyesBlink(es, Speed.MEDIUM, EyeSelector.BOTH)
    idle.nextBlink = idle.clock + IDLE_BLINK_INTERVAL + es.random() * IDLE_BLINK_VARIATION
  }
}

// ── Per-tick update ────────────────────────────────────────────

export function eyesStateUpdate(es: EyesState, dt: number): void {
  if (!Number.isFinite(dt) || dt < 0) {
    throw new InvalidCommandError(`tick elapsed must be finite and >= 0, got ${dt}`, 'elapsed', dt)
  }
  updateIdle(es, dt)
  updateLook(es, dt)
  advanceQueue(es, dt)
}

/** Nothing moving, nothing queued. */
export function eyesIsIdle(es: EyesState): boolean {
  return es.look === null && es.lid === null && es.queue.length === 0 && es.pause <= 0.0
}

export function eyesStatus(es: EyesState): EyesStatus {
  return {
    mood: es.mood,
    blinkPhase: es.blinkPhase,
    lookTarget: es.lookTarget,
    lookSpeed: es.lookSpeed,
    eyeSelector: es.eyeSelector,
    curious: es.curious,
    idleBehaviour: es.idle.enabled,
    busy: !eyesIsIdle(es),
    queued: es.queue.length,
    shut: { left: es.left.shut, right: es.right.shut },
  }
}
