import { createStore, type StoreApi } from 'zustand/vanilla'
import { BlinkPhase, EyeSelector, Mood, Speed } from '../eyes/constants'
import type { EyesStatus } from '../eyes/types'
import { RingBuffer } from '../lib/ringBuffer'

const TICK_HISTORY = 120 // ~4s @ 30Hz

export interface EyesStoreState {
  status: EyesStatus
  frame: number // bumped on every render
  clock: number // engine seconds, sum of tick intervals
  ticks: RingBuffer
  version: number // bumped on every publish

  // Actions
  publish: (status: EyesStatus) => void
  recordTick: (dt: number) => void
  recordFrame: () => void
  /** Ticks per second over the recent history, 0 before any tick. */
  tickRate: () => number
}

export type EyesStore = StoreApi<EyesStoreState>

export const INITIAL_STATUS: EyesStatus = {
  mood: Mood.DEFAULT,
  blinkPhase: BlinkPhase.IDLE,
  lookTarget: null,
  lookSpeed: Speed.MEDIUM,
  eyeSelector: EyeSelector.BOTH,
  curious: false,
  idleBehaviour: false,
  busy: false,
  queued: 0,
  shut: { left: false, right: false },
}

export function createEyesStore(initial: EyesStatus = INITIAL_STATUS): EyesStore {
  return createStore<EyesStoreState>()((set, get) => ({
    status: initial,
    frame: 0,
    clock: 0,
    ticks: new RingBuffer(TICK_HISTORY),
    version: 0,

    publish: (status) => set((s) => ({ status, version: s.version + 1 })),

    recordTick: (dt) => {
      const state = get()
      const clock = state.clock + dt
      state.ticks.push(dt, clock)
      set({ clock })
    },

    recordFrame: () => set((s) => ({ frame: s.frame + 1 })),

    tickRate: () => {
      const mean = get().ticks.mean()
      return mean > 0 ? 1 / mean : 0
    },
  }))
}
