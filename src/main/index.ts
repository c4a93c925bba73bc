/**
 * Public API of the word-parallel CRC32 engine.
 *
 * @module index
 */

export { CrcEngine } from './crc/crc_engine';
export type { CrcEngineEvents } from './crc/crc_engine';
export {
  PRESET_ETHERNET_FRAME,
  PRESET_FORWARD_SINGLE_WORD,
  PRESETS,
  resolve_engine_config,
  polynomial_for,
  byte_order_for,
  finalize_value
} from './crc/config';
export * from './crc/constants';
export { ConfigError, ProtocolViolationError, ScoreboardError } from './crc/errors';
export { capture, EMPTY_SNAPSHOT } from './crc/input_capture';
export {
  crc32_next_state,
  crc32_fold_forward,
  crc32_fold_reversed,
  reverse_bits32
} from './crc/update_engine';
export {
  reference_crc32,
  reference_frame_crc,
  words_to_bytes,
  bytes_to_words
} from './crc/reference';
export type { ReferenceParams } from './crc/reference';
export type {
  PolynomialForm,
  FrameMode,
  Finalize,
  ByteOrder,
  ViolationKind,
  CrcEngineConfig,
  PipelineSnapshot,
  StepInput,
  StepOutput,
  EngineState
} from './crc/types';

export { Scoreboard } from './harness/scoreboard';
export { Stimulus, frame_to_steps, idle_step } from './harness/stimulus';
export { run_simulation, build_script, describe_check } from './harness/simulation';
export type {
  ScoreboardEntry,
  ScoreboardCheck,
  ScoreboardSummary,
  ScriptedStep,
  SimulationOptions,
  SimulationReport
} from './harness/harness_types';
