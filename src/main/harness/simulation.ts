/**
 * Top-level simulation driver.
 *
 * Single-threaded replay of a scripted step sequence:
 *   1. hold reset for a few steps
 *   2. drive frames (back-to-back, or with random idle gaps), queueing each
 *      frame's reference CRC on the scoreboard as its last word goes in
 *   3. check every valid result against the scoreboard
 *   4. drain until nothing is outstanding or the watchdog budget runs out
 *
 * @module harness/simulation
 */

import { CrcEngine } from '../crc/crc_engine';
import type { CrcEngineEvents } from '../crc/crc_engine';
import {
  SIM_DEFAULT_SEED,
  SIM_DEFAULT_TRIALS,
  SIM_MAX_FRAME_WORDS,
  SIM_MAX_IDLE_GAP,
  SIM_MIN_FRAME_WORDS,
  SIM_RESET_STEPS,
  SIM_WATCHDOG_SLACK_STEPS
} from '../crc/constants';
import type { CrcEngineConfig, FrameMode } from '../crc/types';
import { reference_frame_crc } from '../crc/reference';
import { Scoreboard, hex32 } from './scoreboard';
import { Stimulus, frame_to_steps, idle_step } from './stimulus';
import type { ScoreboardCheck, ScriptedStep, SimulationOptions, SimulationReport } from './harness_types';

/**
 * Build the driver script for a list of frames.
 *
 * Single-word mode expects one result per word; multi-word mode one
 * result per frame.
 */
export function build_script(
  frames: readonly number[][],
  config: Readonly<CrcEngineConfig>,
  gap_for: (frame_index: number) => number = () => 0
): ScriptedStep[] {
  const script: ScriptedStep[] = [];

  frames.forEach((words, frame_index) => {
    for (let g = gap_for(frame_index); g > 0; g--) {
      script.push({ input: idle_step() });
    }

    const steps = frame_to_steps(words, config.mode);
    steps.forEach((input, i) => {
      if (config.mode === 'single_word') {
        script.push({ input, expect: reference_frame_crc([words[i]], config), tag: `frame${frame_index}.${i}` });
      } else if (i === steps.length - 1) {
        script.push({ input, expect: reference_frame_crc(words, config), tag: `frame${frame_index}` });
      } else {
        script.push({ input });
      }
    });
  });

  return script;
}

/**
 * Run a randomized (or explicit) self-check of the engine against the
 * byte-serial reference.
 */
export function run_simulation(options: SimulationOptions = {}): SimulationReport {
  const engine = new CrcEngine(options.config);
  const config = engine.get_config();
  const stimulus = new Stimulus(options.seed ?? SIM_DEFAULT_SEED);
  const scoreboard = new Scoreboard();
  const log = options.log === true;

  const frames = options.frames ?? random_frames(stimulus, config.mode, options);
  const gap_for = options.idle_gaps === true ? () => stimulus.next_int(0, SIM_MAX_IDLE_GAP) : () => 0;
  const script = build_script(frames, config, gap_for);
  const expected_results = script.filter((s) => s.expect !== undefined).length;

  const reset_steps = options.reset_steps ?? SIM_RESET_STEPS;
  const budget = options.watchdog_steps ?? reset_steps + script.length + SIM_WATCHDOG_SLACK_STEPS;

  const report: SimulationReport = {
    frames: expected_results,
    steps: 0,
    matched: 0,
    mismatched: 0,
    underflows: 0,
    missing: 0,
    violations: [],
    mismatches: [],
    timed_out: false,
    passed: false
  };

  const on_result: CrcEngineEvents['result'] = (crc, step) => {
    const check: ScoreboardCheck = scoreboard.check(crc, step);
    if (check.status !== 'match') {
      report.mismatches.push(check);
      if (log) {
        console.warn(`[SIM] ${describe_check(check)}`);
      }
    }
  };
  const on_violation: CrcEngineEvents['violation'] = (kinds, step) => {
    report.violations.push({ step, kinds });
    if (log) {
      console.warn(`[SIM] protocol violation at step ${step}: ${kinds.join(', ')}`);
    }
  };
  engine.on('result', on_result);
  engine.on('violation', on_violation);

  if (log) {
    console.info(
      `[SIM] ${config.polynomial_form}/${config.mode}/${config.finalize}: ` +
      `${frames.length} frames, ${script.length} driver steps, budget ${budget}`
    );
  }

  // Reset window
  engine.set_reset(true);
  for (let i = 0; i < reset_steps && report.steps < budget; i++) {
    engine.step(idle_step());
    report.steps++;
  }
  engine.set_reset(false);

  // Driver: one scripted step per clock
  for (const scripted of script) {
    if (report.steps >= budget) break;
    if (scripted.expect !== undefined) {
      scoreboard.expect(scripted.expect, scripted.tag);
    }
    engine.step(scripted.input);
    report.steps++;
  }

  // Drain the pipeline
  while (scoreboard.pending() > 0 && report.steps < budget) {
    engine.idle();
    report.steps++;
  }

  engine.removeListener('result', on_result);
  engine.removeListener('violation', on_violation);

  const summary = scoreboard.summary();
  report.matched = summary.matched;
  report.mismatched = summary.mismatched;
  report.underflows = summary.underflows;
  report.missing = expected_results - summary.matched - summary.mismatched;
  report.timed_out = report.missing > 0 && report.steps >= budget;
  report.passed =
    report.mismatched === 0 &&
    report.underflows === 0 &&
    report.missing === 0 &&
    report.violations.length === 0 &&
    !report.timed_out;

  if (log) {
    console.info(
      `[SIM] ${report.passed ? 'PASS' : 'FAIL'}: ${report.matched}/${report.frames} matched, ` +
      `${report.mismatched} mismatched, ${report.underflows} underflows, ` +
      `${report.missing} missing, ${report.steps} steps${report.timed_out ? ' (watchdog)' : ''}`
    );
  }

  return report;
}

function random_frames(stimulus: Stimulus, mode: FrameMode, options: SimulationOptions): number[][] {
  const trials = options.trials ?? SIM_DEFAULT_TRIALS;
  const min_words = options.min_frame_words ?? SIM_MIN_FRAME_WORDS;
  const max_words = options.max_frame_words ?? (mode === 'single_word' ? 1 : SIM_MAX_FRAME_WORDS);
  const frames: number[][] = [];
  for (let i = 0; i < trials; i++) {
    frames.push(stimulus.random_frame(min_words, max_words));
  }
  return frames;
}

/** One-line description of a failed scoreboard check. */
export function describe_check(check: ScoreboardCheck): string {
  switch (check.status) {
    case 'match':
      return `${check.tag}: 0x${hex32(check.actual)} ok at step ${check.step}`;
    case 'mismatch':
      return `${check.tag}: expected 0x${hex32(check.expected)}, got 0x${hex32(check.actual)} at step ${check.step}`;
    case 'underflow':
      return `unexpected result 0x${hex32(check.actual)} at step ${check.step}`;
  }
}
