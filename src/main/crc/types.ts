/**
 * Types for the word-parallel CRC32 engine.
 *
 * Configuration, pipeline snapshot, per-step inputs/outputs and the
 * engine state snapshot exposed to callers.
 *
 * @module crc/types
 */

// ---------------------------------------------------------------------------
// Configuration enums
// ---------------------------------------------------------------------------

/**
 * Polynomial representation. `'forward'` folds MSB-first with 0x04C11DB7,
 * `'reversed'` folds LSB-first with 0xEDB88320.
 */
export type PolynomialForm = 'forward' | 'reversed';

/** When the output stage raises `valid`. */
export type FrameMode = 'single_word' | 'multi_word_frame';

/** Transform applied to the accumulator to produce the result. */
export type Finalize = 'identity' | 'complement';

/** Byte layout of a 32-bit word in the equivalent byte stream. */
export type ByteOrder = 'big_endian' | 'little_endian';

/** Sequencing faults detected on the raw inputs. */
export type ViolationKind = 'start_without_enable' | 'end_without_enable';

/** Engine configuration, fixed at construction. */
export interface CrcEngineConfig {
  polynomial_form: PolynomialForm;
  /** Accumulator value at reset and at each start-of-frame (u32). */
  seed: number;
  mode: FrameMode;
  finalize: Finalize;
  /** Throw on protocol violations instead of reporting them. */
  strict: boolean;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/** Captured copy of the raw inputs, consumed one step later. */
export interface PipelineSnapshot {
  word: number;
  enable: boolean;
  start_of_frame: boolean;
  end_of_frame: boolean;
}

/** Raw inputs presented on one clock step. */
export interface StepInput {
  /** Data word (u32). */
  data_word: number;
  enable: boolean;
  start_of_frame: boolean;
  /** Only meaningful in multi-word-frame mode. */
  end_of_frame?: boolean;
}

/** Outputs observed after one clock step. */
export interface StepOutput {
  /** Index of the step that produced this output (0-based). */
  step: number;
  /** Finalized CRC; only meaningful when `valid` is true. */
  result: number;
  /** True for exactly one step per completed frame (or word). */
  valid: boolean;
  /** Advisory diagnostics for this step's raw inputs. Empty when clean. */
  violations: ViolationKind[];
}

/** Read-only copy of the engine's registers. */
export interface EngineState {
  accumulator: number;
  snapshot: PipelineSnapshot;
  valid: boolean;
  result: number;
  in_reset: boolean;
  /** Number of steps processed since construction. */
  step: number;
}
