import { taggedLogger, type Logger } from '../lib/log'
import { createEyesStore, type EyesStore } from '../stores/eyesStore'
import { Bitmap } from './bitmap'
import { applyCommandPacket, type CommandResult } from './commandBridge'
import { EyeSelector, type EyeSide, type LookDirection, type Mood, Speed } from './constants'
import { resolveEyeConfig } from './config'
import type { ConfigOutOfBounds } from './errors'
import { makePrng } from './prng'
import { renderEyes } from './render'
import {
  createEyesState,
  eyesBlink,
  eyesClose,
  eyesIsIdle,
  eyesLook,
  eyesOpen,
  eyesSetCurious,
  eyesSetIdle,
  eyesSetMood,
  eyesStateUpdate,
  eyesStatus,
  eyesWakeup,
} from './state'
import type {
  Easing,
  EyeConfig,
  EyeModel,
  EyesState,
  EyesStatus,
  ResolvedEyeParams,
  ScreenConfig,
} from './types'

export interface EyeEngineOptions {
  logger?: Logger
  easing?: Easing
  /** Overrides the idle PRNG seeded from `config.idle.seed`. */
  random?: () => number
  store?: EyesStore
}

/**
 * Host-facing facade: owns the eye state, drives it from external ticks and
 * publishes a status snapshot to the store after every tick or command.
 */
export class EyeEngine {
  readonly params: ResolvedEyeParams
  readonly issues: readonly ConfigOutOfBounds[]
  readonly store: EyesStore
  private readonly es: EyesState
  private readonly log: Logger

  constructor(
    readonly screen: ScreenConfig,
    config: EyeConfig,
    options: EyeEngineOptions = {},
  ) {
    this.log = options.logger ?? taggedLogger('EyeEngine')
    const resolved = resolveEyeConfig(screen, config, this.log)
    this.params = resolved.params
    this.issues = resolved.issues
    this.store = options.store ?? createEyesStore()

    this.es = createEyesState(screen, resolved.params, {
      random: options.random ?? makePrng(config.idle?.seed ?? 0),
      easing: options.easing,
      logger: this.log,
    })
    if (config.idle?.enabled) eyesSetIdle(this.es, true)
    this.publish()
  }

  /** Snapshot of one eye's geometry and lids; edits to it do not reach the engine. */
  eye(side: EyeSide): EyeModel {
    const eye = this.es[side]
    return { ...eye, home: { ...eye.home }, center: { ...eye.center } }
  }

  status(): EyesStatus {
    return eyesStatus(this.es)
  }

  tick(dt: number): void {
    eyesStateUpdate(this.es, dt)
    this.store.getState().recordTick(dt)
    this.publish()
  }

  /** Draws the current state into a fresh bitmap. */
  render(): Bitmap {
    const bitmap = Bitmap.forScreen(this.screen)
    renderEyes(this.es, bitmap)
    this.store.getState().recordFrame()
    return bitmap
  }

  look(direction: LookDirection, speed: Speed = Speed.FAST): void {
    eyesLook(this.es, direction, speed)
    this.publish()
  }

  blink(speed: Speed = Speed.MEDIUM, eye: EyeSelector = EyeSelector.BOTH): void {
    eyesBlink(this.es, speed, eye)
    this.publish()
  }

  close(speed: Speed = Speed.MEDIUM, eye: EyeSelector = EyeSelector.BOTH): void {
    eyesClose(this.es, speed, eye)
    this.publish()
  }

  open(speed: Speed = Speed.MEDIUM, eye: EyeSelector = EyeSelector.BOTH): void {
    eyesOpen(this.es, speed, eye)
    this.publish()
  }

  setMood(mood: Mood): void {
    eyesSetMood(this.es, mood)
    this.publish()
  }

  setCurious(active: boolean): void {
    eyesSetCurious(this.es, active)
    this.publish()
  }

  setIdle(enabled: boolean): void {
    eyesSetIdle(this.es, enabled)
    this.publish()
  }

  wakeup(): void {
    eyesWakeup(this.es)
    this.publish()
  }

  /** Packet boundary: never throws for a rejected command. */
  send(raw: unknown): CommandResult {
    const result = applyCommandPacket(this.es, raw)
    if (result.ok) this.publish()
    return result
  }

  isIdle(): boolean {
    return eyesIsIdle(this.es)
  }

  private publish(): void {
    this.store.getState().publish(eyesStatus(this.es))
  }
}
