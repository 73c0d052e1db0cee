// @vitest-environment node

import { describe, expect, it } from 'vitest'
import { silentLogger } from '../lib/log'
import { DEFAULT_EYE_DEFAULTS, DEFAULT_SCREEN_CONFIG } from './config'
import { BlinkPhase, EyeSelector, LookDirection, Mood, Speed } from './constants'
import { EyeEngine } from './engine'
import type { EyeConfig } from './types'

const CONFIG: EyeConfig = {
  defaults: { ...DEFAULT_EYE_DEFAULTS, width: 40, height: 40, spacing: 10, cornerRadius: 8 },
}

function makeEngine(config: EyeConfig = CONFIG): EyeEngine {
  return new EyeEngine(DEFAULT_SCREEN_CONFIG, config, { logger: silentLogger })
}

describe('EyeEngine', () => {
  it('resolves the configuration once', () => {
    const engine = makeEngine()
    expect(engine.params.source).toBe('defaults')
    expect(engine.params.left).toEqual({ width: 40, height: 40, cornerRadius: 8 })
    expect(engine.issues).toEqual([])
    expect(engine.isIdle()).toBe(true)
  })

  it('reports clamped configuration values', () => {
    const engine = makeEngine({ ...CONFIG, unit: { left: { height: 90 } } })
    expect(engine.params.left.height).toBe(64)
    expect(engine.issues).toEqual([
      { kind: 'ConfigOutOfBounds', field: 'left.height', requested: 90, applied: 64 },
    ])
  })

  it('publishes status after each command and tick', () => {
    const engine = makeEngine()
    const v0 = engine.store.getState().version
    engine.blink(Speed.MEDIUM, EyeSelector.RIGHT)
    let status = engine.store.getState().status
    expect(status.blinkPhase).toBe(BlinkPhase.CLOSING)
    expect(status.eyeSelector).toBe(EyeSelector.RIGHT)
    expect(status.busy).toBe(true)
    expect(engine.store.getState().version).toBe(v0 + 1)

    engine.tick(0.5)
    status = engine.store.getState().status
    expect(status.blinkPhase).toBe(BlinkPhase.IDLE)
    expect(status.busy).toBe(false)
    expect(engine.store.getState().clock).toBe(0.5)
  })

  it('renders a fresh bitmap per frame', () => {
    const engine = makeEngine()
    const a = engine.render()
    engine.setMood(Mood.HAPPY)
    const b = engine.render()
    expect(a.width).toBe(128)
    expect(a.height).toBe(64)
    expect(a.equals(b)).toBe(false)
    expect(engine.store.getState().frame).toBe(2)
  })

  it('moves and scales through the facade', () => {
    const engine = makeEngine()
    engine.setCurious(true)
    engine.look(LookDirection.LEFT, Speed.FAST)
    engine.tick(0.5)
    expect(engine.eye('left').width).toBeCloseTo(56, 10)
    expect(engine.store.getState().status.curious).toBe(true)
    expect(engine.store.getState().status.lookTarget).toBeNull()
  })

  it('closes and opens', () => {
    const engine = makeEngine()
    engine.close(Speed.FAST)
    engine.tick(0.1)
    expect(engine.store.getState().status.shut).toEqual({ left: true, right: true })
    engine.open(Speed.FAST)
    engine.tick(0.1)
    expect(engine.store.getState().status.shut).toEqual({ left: false, right: false })
    expect(engine.eye('left').eyelidTop).toBe(0)
  })

  it('hands out eye copies that do not write back', () => {
    const engine = makeEngine()
    const eye = engine.eye('left')
    eye.width = -5
    eye.center.x = 500
    expect(engine.eye('left').width).toBe(40)
    expect(engine.eye('left').center.x).toBe(39)
    expect(engine.status()).toEqual(engine.store.getState().status)
  })

  it('wakes up into the default mood', () => {
    const engine = makeEngine()
    engine.wakeup()
    expect(engine.store.getState().status.mood).toBe(Mood.TIRED)
    for (let i = 0; i < 40; i++) engine.tick(0.1)
    expect(engine.store.getState().status.mood).toBe(Mood.DEFAULT)
    expect(engine.isIdle()).toBe(true)
  })

  it('answers raw packets with a result', () => {
    const engine = makeEngine()
    const v0 = engine.store.getState().version
    expect(engine.send({ cmd: 'dance' }).ok).toBe(false)
    expect(engine.store.getState().version).toBe(v0)

    const result = engine.send({ cmd: 'mood', mood: 'angry' })
    expect(result).toEqual({ ok: true, command: { cmd: 'set_mood', mood: Mood.ANGRY } })
    expect(engine.store.getState().status.mood).toBe(Mood.ANGRY)
  })

  it('starts idle behaviour from the configuration', () => {
    const engine = makeEngine({ ...CONFIG, idle: { enabled: true, seed: 3 } })
    expect(engine.store.getState().status.idleBehaviour).toBe(true)
    engine.setIdle(false)
    expect(engine.store.getState().status.idleBehaviour).toBe(false)
  })
})
