// @vitest-environment node

import { describe, expect, it } from 'vitest'
import { silentLogger, type Logger } from '../lib/log'
import { DEFAULT_SCREEN_CONFIG } from './config'
import { BG_COLOR, BlinkPhase, EyeSelector, FG_COLOR, LookDirection, Mood, Speed } from './constants'
import { InvalidCommandError } from './errors'
import { MOODS } from './moods'
import { makePrng } from './prng'
import { eyeBox } from './render'
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
  travelRange,
  type EyesStateOptions,
} from './state'
import { easeInOutSine, type EyesState, type ResolvedEyeParams } from './types'

const PARAMS: ResolvedEyeParams = {
  left: { width: 40, height: 40, cornerRadius: 8 },
  right: { width: 40, height: 40, cornerRadius: 8 },
  spacing: 10,
  shape: 'rounded',
  color: FG_COLOR,
  background: BG_COLOR,
  source: 'defaults',
}

function makeState(options: EyesStateOptions = {}): EyesState {
  return createEyesState(DEFAULT_SCREEN_CONFIG, PARAMS, { logger: silentLogger, ...options })
}

function recordingLogger(): { logger: Logger; warnings: string[] } {
  const warnings: string[] = []
  const noop = () => {}
  return {
    logger: { debug: noop, info: noop, warn: (m: string) => warnings.push(m), error: noop },
    warnings,
  }
}

function run(es: EyesState, seconds: number, step = 0.1): void {
  const n = Math.round(seconds / step)
  for (let i = 0; i < n; i++) eyesStateUpdate(es, step)
}

describe('createEyesState', () => {
  it('starts open, centred and idle', () => {
    const es = makeState()
    expect(es.left.center).toEqual({ x: 39, y: 32 })
    expect(es.right.center).toEqual({ x: 89, y: 32 })
    expect(es.left.eyelidTop).toBe(0)
    expect(es.blinkPhase).toBe(BlinkPhase.IDLE)
    expect(eyesIsIdle(es)).toBe(true)
  })
})

describe('blink', () => {
  it('steps through closing, closed and opening', () => {
    const es = makeState()
    eyesBlink(es, Speed.MEDIUM)
    expect(es.blinkPhase).toBe(BlinkPhase.CLOSING)

    eyesStateUpdate(es, 0.06)
    expect(es.left.eyelidTop).toBeCloseTo(0.5, 10)
    expect(es.right.eyelidTop).toBeCloseTo(0.5, 10)

    eyesStateUpdate(es, 0.06)
    expect(es.blinkPhase).toBe(BlinkPhase.CLOSED)
    expect(es.left.eyelidTop).toBe(1)

    eyesStateUpdate(es, 0.06)
    expect(es.blinkPhase).toBe(BlinkPhase.OPENING)
    expect(es.left.eyelidTop).toBe(1)

    eyesStateUpdate(es, 0.06)
    expect(es.left.eyelidTop).toBeCloseTo(0.5, 10)

    eyesStateUpdate(es, 0.06)
    expect(es.blinkPhase).toBe(BlinkPhase.IDLE)
    expect(es.left.eyelidTop).toBe(0)
    expect(eyesIsIdle(es)).toBe(true)
  })

  it('returns to the resting coverage for every mood', () => {
    for (const mood of MOODS) {
      const es = makeState()
      eyesSetMood(es, mood)
      const rest = { left: es.left.eyelidTop, right: es.right.eyelidTop }
      eyesBlink(es, Speed.FAST, EyeSelector.BOTH)
      run(es, 0.3)
      expect({ left: es.left.eyelidTop, right: es.right.eyelidTop }).toEqual(rest)
      expect(es.left.width).toBe(40)
      expect(es.left.height).toBe(40)
    }
  })

  it('completes inside one long tick', () => {
    const es = makeState()
    eyesBlink(es, Speed.FAST)
    eyesStateUpdate(es, 0.21)
    expect(es.blinkPhase).toBe(BlinkPhase.IDLE)
    expect(es.left.eyelidTop).toBe(0)
  })

  it('returns to the mood rest coverage exactly', () => {
    const es = makeState()
    eyesSetMood(es, Mood.TIRED)
    eyesBlink(es, Speed.SLOW)
    run(es, 1.0)
    expect(es.left.eyelidTop).toBe(0.25)
    expect(es.left.eyelidSlope).toBe(-0.25)
  })

  it('only moves the selected eye', () => {
    const es = makeState()
    eyesBlink(es, Speed.MEDIUM, EyeSelector.LEFT)
    eyesStateUpdate(es, 0.12)
    expect(es.left.eyelidTop).toBe(1)
    expect(es.right.eyelidTop).toBe(0)
    expect(es.eyeSelector).toBe(EyeSelector.LEFT)
  })

  it('lands on a mood changed mid-blink', () => {
    const es = makeState()
    eyesBlink(es, Speed.MEDIUM)
    eyesStateUpdate(es, 0.06)
    eyesSetMood(es, Mood.ANGRY)
    expect(es.left.eyelidTop).toBeCloseTo(0.5, 10)
    run(es, 0.5)
    expect(es.left.eyelidTop).toBe(0.25)
    expect(es.mood).toBe(Mood.ANGRY)
  })
})

describe('lid queue', () => {
  it('runs queued steps in order and carries leftover time', () => {
    const es = makeState()
    eyesBlink(es, Speed.MEDIUM, EyeSelector.LEFT)
    eyesBlink(es, Speed.MEDIUM, EyeSelector.RIGHT)
    expect(es.queue).toHaveLength(1)

    eyesStateUpdate(es, 0.35)
    expect(es.queue).toHaveLength(0)
    expect(es.eyeSelector).toBe(EyeSelector.RIGHT)
    expect(es.blinkPhase).toBe(BlinkPhase.CLOSING)
    expect(es.left.eyelidTop).toBe(0)
    expect(es.right.eyelidTop).toBeCloseTo(0.05 / 0.12, 6)
  })

  it('drops items beyond the queue limit', () => {
    const { logger, warnings } = recordingLogger()
    const es = makeState({ logger })
    for (let i = 0; i < 18; i++) eyesBlink(es, Speed.FAST)
    expect(es.queue).toHaveLength(16)
    expect(warnings).toEqual(['queue full (16), dropping lid'])
  })
})

describe('close / open', () => {
  it('holds the eyes shut until opened', () => {
    const es = makeState()
    eyesClose(es, Speed.FAST)
    eyesStateUpdate(es, 0.1)
    expect(es.left.shut).toBe(true)
    expect(es.left.eyelidTop).toBe(1)
    expect(es.blinkPhase).toBe(BlinkPhase.IDLE)

    eyesSetMood(es, Mood.HAPPY)
    expect(es.left.eyelidTop).toBe(1)

    eyesOpen(es, Speed.FAST)
    expect(es.left.shut).toBe(false)
    eyesStateUpdate(es, 0.1)
    expect(es.left.eyelidTop).toBe(0)
    expect(es.left.eyelidBottom).toBe(0.5)
  })

  it('ignores opening eyes that are already open', () => {
    const { logger, warnings } = recordingLogger()
    const es = makeState({ logger })
    eyesOpen(es, Speed.FAST)
    expect(es.lid).toBeNull()
    expect(eyesIsIdle(es)).toBe(true)
    expect(warnings).toEqual(['open both: already open, skipping'])
  })

  it('opens only the shut eye', () => {
    const es = makeState()
    eyesClose(es, Speed.FAST, EyeSelector.RIGHT)
    eyesStateUpdate(es, 0.1)
    eyesOpen(es, Speed.FAST, EyeSelector.BOTH)
    expect(es.lid?.sides).toEqual(['right'])
  })
})

describe('wakeup', () => {
  it('starts shut and tired, then opens to the default mood', () => {
    const es = makeState()
    eyesWakeup(es)
    expect(es.mood).toBe(Mood.TIRED)
    expect(es.left.shut).toBe(true)
    expect(es.left.eyelidTop).toBe(1)
    expect(es.queue).toHaveLength(7)

    eyesStateUpdate(es, 1.0)
    expect(es.left.eyelidTop).toBe(1)

    eyesStateUpdate(es, 1.1)
    expect(es.blinkPhase).toBe(BlinkPhase.OPENING)
    expect(es.left.eyelidTop).toBeCloseTo(1 - 0.75 * (0.1 / 0.24), 6)

    run(es, 2.0)
    expect(es.mood).toBe(Mood.DEFAULT)
    expect(es.left.shut).toBe(false)
    expect(es.right.shut).toBe(false)
    expect(es.left.eyelidTop).toBe(0)
    expect(eyesIsIdle(es)).toBe(true)
  })
})

describe('look', () => {
  it('travels to the screen extremes', () => {
    const es = makeState()
    expect(travelRange(es)).toEqual({ minX: -19, maxX: 19, minY: -12, maxY: 12 })

    eyesLook(es, LookDirection.TOP_RIGHT, Speed.FAST)
    expect(es.lookTarget).toBe(LookDirection.TOP_RIGHT)
    eyesStateUpdate(es, 0.15)
    expect(es.offset.x).toBeCloseTo(9.5, 10)
    expect(es.offset.y).toBeCloseTo(-6, 10)

    eyesStateUpdate(es, 0.2)
    expect(es.offset).toEqual({ x: 19, y: -12 })
    expect(es.lookTarget).toBeNull()
    expect(es.left.center).toEqual({ x: 58, y: 20 })
    expect(es.right.center).toEqual({ x: 108, y: 20 })
  })

  it('moves both eyes up and right until idle', () => {
    const es = makeState()
    eyesLook(es, LookDirection.TOP_RIGHT, Speed.SLOW)
    let ticks = 0
    while (!eyesIsIdle(es) && ticks < 100) {
      eyesStateUpdate(es, 1 / 30)
      ticks++
    }
    expect(eyesIsIdle(es)).toBe(true)
    expect(es.left.center).toEqual({ x: 39 + 19, y: 32 - 12 })
    expect(es.right.center).toEqual({ x: 89 + 19, y: 32 - 12 })
  })

  it('keeps both boxes on screen for every direction and size', () => {
    const sizes: Array<[number, number]> = [
      [40, 40],
      [20, 44],
      [40, 60],
      [58, 24],
      [10, 10],
    ]
    for (const [w, h] of sizes) {
      for (const direction of Object.values(LookDirection)) {
        for (const curious of [false, true]) {
          const es = createEyesState(
            DEFAULT_SCREEN_CONFIG,
            {
              ...PARAMS,
              spacing: 8,
              left: { width: w, height: h, cornerRadius: 4 },
              right: { width: w, height: h, cornerRadius: 4 },
            },
            { logger: silentLogger },
          )
          eyesSetCurious(es, curious)
          eyesLook(es, direction, Speed.FAST)
          eyesStateUpdate(es, 0.5)
          for (const eye of [es.left, es.right]) {
            expect(eye.center.x - eye.width / 2).toBeGreaterThanOrEqual(0)
            expect(eye.center.x + eye.width / 2).toBeLessThanOrEqual(128 + 1e-9)
            expect(eye.center.y - eye.height / 2).toBeGreaterThanOrEqual(0)
            expect(eye.center.y + eye.height / 2).toBeLessThanOrEqual(64 + 1e-9)
            const box = eyeBox(eye)
            expect(box.y).toBeGreaterThanOrEqual(0)
            expect(box.y + box.h).toBeLessThanOrEqual(64)
          }
        }
      }
    }
  })

  it('caps a curious eye at the screen height', () => {
    const es = createEyesState(
      DEFAULT_SCREEN_CONFIG,
      {
        ...PARAMS,
        left: { width: 40, height: 60, cornerRadius: 8 },
        right: { width: 40, height: 60, cornerRadius: 8 },
      },
      { logger: silentLogger },
    )
    eyesSetCurious(es, true)
    eyesLook(es, LookDirection.LEFT, Speed.FAST)
    eyesStateUpdate(es, 0.5)
    expect(es.left.height).toBe(64)
    expect(es.left.center.x).toBeCloseTo(28, 10)
    expect(es.left.center.y).toBe(32)
    expect(eyeBox(es.left)).toEqual({ x: 0, y: 0, w: 56, h: 64 })
    expect(es.right.height).toBeCloseTo(36, 10)

    eyesSetCurious(es, false)
    expect(es.left.height).toBe(60)
  })

  it('replaces an in-flight look from the current offset', () => {
    const es = makeState()
    eyesLook(es, LookDirection.RIGHT, Speed.FAST)
    eyesStateUpdate(es, 0.15)
    eyesLook(es, LookDirection.LEFT, Speed.FAST)
    expect(es.look?.start.x).toBeCloseTo(9.5, 10)
    eyesStateUpdate(es, 0.15)
    expect(es.offset.x).toBeCloseTo(-4.75, 10)
    eyesStateUpdate(es, 0.2)
    expect(es.offset.x).toBe(-19)
  })

  it('returns home on centre', () => {
    const es = makeState()
    eyesLook(es, LookDirection.BOTTOM_LEFT, Speed.FAST)
    eyesStateUpdate(es, 0.5)
    eyesLook(es, LookDirection.CENTER, Speed.SLOW)
    eyesStateUpdate(es, 1.0)
    expect(es.offset).toEqual({ x: 0, y: 0 })
    expect(es.left.center).toEqual({ x: 39, y: 32 })
  })
})

describe('easing', () => {
  const quarter = 0.5 * (1 - Math.cos(Math.PI / 4))

  it('shapes the blink but keeps its endpoints', () => {
    const es = makeState({ easing: easeInOutSine })
    eyesBlink(es, Speed.SLOW)
    eyesStateUpdate(es, 0.06)
    expect(es.left.eyelidTop).toBeCloseTo(quarter, 10)
    expect(es.left.eyelidTop).not.toBeCloseTo(0.25, 3)
    eyesStateUpdate(es, 0.19)
    expect(es.left.eyelidTop).toBe(1)
    run(es, 1.0)
    expect(es.left.eyelidTop).toBe(0)
  })

  it('shapes the look but lands on the travel extreme', () => {
    const es = makeState({ easing: easeInOutSine })
    eyesLook(es, LookDirection.RIGHT, Speed.FAST)
    eyesStateUpdate(es, 0.075)
    expect(es.offset.x).toBeCloseTo(19 * quarter, 8)
    eyesStateUpdate(es, 0.3)
    expect(es.offset.x).toBe(19)
    expect(es.lookTarget).toBeNull()
  })
})

describe('curious', () => {
  it('scales by look side and restores the base size', () => {
    const es = makeState()
    eyesSetCurious(es, true)
    expect(es.left.width).toBe(40)

    eyesLook(es, LookDirection.LEFT, Speed.FAST)
    expect(es.left.width).toBeCloseTo(56, 10)
    expect(es.right.width).toBeCloseTo(24, 10)
    eyesStateUpdate(es, 0.5)
    expect(es.left.center.x - es.left.width / 2).toBeGreaterThanOrEqual(0)

    eyesLook(es, LookDirection.RIGHT, Speed.FAST)
    expect(es.left.width).toBeCloseTo(24, 10)
    expect(es.right.width).toBeCloseTo(56, 10)

    eyesSetCurious(es, false)
    expect(es.left.width).toBe(40)
    expect(es.right.width).toBe(40)
    expect(es.right.height).toBe(40)
  })
})

describe('rejected input', () => {
  it('throws before touching state', () => {
    const es = makeState()
    expect(() => eyesSetMood(es, JSON.parse('"grumpy"'))).toThrow(InvalidCommandError)
    expect(() => eyesLook(es, JSON.parse('"NNE"'), Speed.FAST)).toThrow(InvalidCommandError)
    expect(() => eyesBlink(es, JSON.parse('"warp"'))).toThrow(InvalidCommandError)
    expect(() => eyesClose(es, Speed.FAST, JSON.parse('"middle"'))).toThrow(InvalidCommandError)
    expect(es.mood).toBe(Mood.DEFAULT)
    expect(es.gaze).toBe(LookDirection.CENTER)
    expect(eyesIsIdle(es)).toBe(true)
  })

  it('rejects a negative or non-finite tick', () => {
    const es = makeState()
    expect(() => eyesStateUpdate(es, -0.1)).toThrow(InvalidCommandError)
    expect(() => eyesStateUpdate(es, Number.NaN)).toThrow(InvalidCommandError)
    expect(() => eyesStateUpdate(es, 0)).not.toThrow()
  })
})

describe('idle behaviour', () => {
  it('stays still while disabled', () => {
    const es = makeState()
    run(es, 10)
    expect(eyesIsIdle(es)).toBe(true)
    expect(es.offset).toEqual({ x: 0, y: 0 })
  })

  it('schedules looks and blinks from the random source', () => {
    // third draw picks the direction: floor(0.5 * 9) = 4 → R
    const draws = [0, 0, 0.5]
    const es = makeState({ random: () => draws.shift() ?? 0 })
    eyesSetIdle(es, true)
    expect(es.idle.nextLook).toBe(1.5)
    expect(es.idle.nextBlink).toBe(2)

    eyesStateUpdate(es, 1.6)
    expect(es.gaze).toBe(LookDirection.RIGHT)
    expect(es.lookSpeed).toBe(Speed.SLOW)
    expect(es.offset.x).toBe(19)
    expect(es.idle.nextLook).toBeCloseTo(3.1, 10)
    expect(es.lid).toBeNull()

    eyesStateUpdate(es, 0.39)
    expect(es.lid).toBeNull()
    eyesStateUpdate(es, 0.02)
    expect(es.blinkPhase).toBe(BlinkPhase.CLOSING)
  })

  it('replays identically for the same seed', () => {
    const a = makeState({ random: makePrng(5) })
    const b = makeState({ random: makePrng(5) })
    eyesSetIdle(a, true)
    eyesSetIdle(b, true)
    run(a, 12, 0.05)
    run(b, 12, 0.05)
    expect(a.offset).toEqual(b.offset)
    expect(a.left.eyelidTop).toBe(b.left.eyelidTop)
    expect(eyesStatus(a)).toEqual(eyesStatus(b))
  })
})

describe('eyesStatus', () => {
  it('summarises the animation state', () => {
    const es = makeState()
    eyesClose(es, Speed.SLOW, EyeSelector.LEFT)
    eyesBlink(es, Speed.FAST)
    expect(eyesStatus(es)).toEqual({
      mood: Mood.DEFAULT,
      blinkPhase: BlinkPhase.CLOSING,
      lookTarget: null,
      lookSpeed: Speed.MEDIUM,
      eyeSelector: EyeSelector.LEFT,
      curious: false,
      idleBehaviour: false,
      busy: true,
      queued: 1,
      shut: { left: false, right: false },
    })
  })
})
