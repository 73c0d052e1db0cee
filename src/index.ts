export { Bitmap } from './eyes/bitmap'
export {
  applyCommand,
  applyCommandPacket,
  parseCommand,
  type CommandResult,
  type EyeCommand,
} from './eyes/commandBridge'
export {
  DEFAULT_EYE_DEFAULTS,
  DEFAULT_SCREEN_CONFIG,
  deriveSeededLayout,
  homeCenters,
  parseEyeConfig,
  parseScreenConfig,
  resolveEyeConfig,
  type ResolvedConfig,
} from './eyes/config'
export {
  BlinkPhase,
  EyeSelector,
  LookDirection,
  Mood,
  Speed,
  type ColorMode,
  type EyeShape,
  type EyeSide,
  type RGB,
} from './eyes/constants'
export { EyeEngine, type EyeEngineOptions } from './eyes/engine'
export {
  ConfigError,
  EyesError,
  InvalidCommandError,
  type ConfigOutOfBounds,
  type EyesErrorCode,
} from './eyes/errors'
export {
  applyCuriousScale,
  applyMoodShape,
  clampToBounds,
  setBaseSize,
  setEyelidCoverage,
} from './eyes/eyeModel'
export {
  ellipsePoints,
  fillEllipse,
  fillPolygon,
  fillRect,
  fillRoundedRect,
  roundedRectPoints,
} from './eyes/geometry'
export { MOOD_SHAPES, isMood } from './eyes/moods'
export { hashSeed, makePrng } from './eyes/prng'
export { eyeBox, renderEyes } from './eyes/render'
export {
  createEyesState,
  eyesBlink,
  eyesClose,
  eyesIsIdle,
  eyesLook,
  eyesOpen,
  eyesSetBaseSize,
  eyesSetCurious,
  eyesSetIdle,
  eyesSetMood,
  eyesStateUpdate,
  eyesStatus,
  eyesWakeup,
  travelRange,
  type EyesStateOptions,
} from './eyes/state'
export { easeInOutSine, linear } from './eyes/types'
export type {
  Easing,
  EyeConfig,
  EyeModel,
  EyesState,
  EyesStatus,
  ResolvedEyeParams,
  ScreenConfig,
} from './eyes/types'
export { consoleLogger, silentLogger, taggedLogger, type Logger } from './lib/log'
export { createEyesStore, type EyesStore, type EyesStoreState } from './stores/eyesStore'
