/**
 * Types shared by the scoreboard, stimulus generator and simulation driver.
 *
 * @module harness/harness_types
 */

import type { CrcEngineConfig, StepInput, ViolationKind } from '../crc/types';

// ---------------------------------------------------------------------------
// Scoreboard
// ---------------------------------------------------------------------------

/** One outstanding expected frame. */
export interface ScoreboardEntry {
  crc: number;
  tag: string;
}

/** Outcome of checking one valid result. */
export type ScoreboardCheck =
  | { status: 'match'; actual: number; expected: number; tag: string; step: number }
  | { status: 'mismatch'; actual: number; expected: number; tag: string; step: number }
  | { status: 'underflow'; actual: number; step: number };

/** Counters at any point of a run. */
export interface ScoreboardSummary {
  matched: number;
  mismatched: number;
  underflows: number;
  pending: number;
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

/** One scripted driver step. */
export interface ScriptedStep {
  input: StepInput;
  /** Expected CRC queued on the scoreboard when this step submits a frame's last word. */
  expect?: number;
  tag?: string;
}

/** Options for {@link run_simulation}. */
export interface SimulationOptions {
  /** Engine configuration overrides. Defaults to the Ethernet preset. */
  config?: Partial<CrcEngineConfig>;
  /** Number of randomized frames. */
  trials?: number;
  /** PRNG seed. */
  seed?: number;
  min_frame_words?: number;
  max_frame_words?: number;
  /** Insert random idle steps between frames. Back-to-back when false. */
  idle_gaps?: boolean;
  /** Steps to hold reset before the first frame. */
  reset_steps?: number;
  /** Hard step budget. Defaults to the scripted length plus slack. */
  watchdog_steps?: number;
  /** Explicit frames to drive instead of random ones. */
  frames?: number[][];
  /** Emit `[SIM]` console lines. */
  log?: boolean;
}

/** Result of a simulation run. */
export interface SimulationReport {
  frames: number;
  steps: number;
  matched: number;
  mismatched: number;
  underflows: number;
  /** Frames that never produced a result. */
  missing: number;
  violations: { step: number; kinds: ViolationKind[] }[];
  mismatches: ScoreboardCheck[];
  timed_out: boolean;
  passed: boolean;
}
