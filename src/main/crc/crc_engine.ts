/**
 * Streaming CRC32 engine: output / protocol stage.
 *
 * Owns the accumulator, the pipeline snapshot and the valid latch, and
 * advances them once per call to {@link CrcEngine.step}.
 *
 * Timing (step k presents word W):
 *   step k     snapshot <- W                      (input capture)
 *   step k+1   accumulator <- next(accumulator, W) (if W was enabled)
 *              valid <- W enabled [&& W ended the frame]
 *
 * Reset:
 *   reset()          pulse; clears the registers immediately
 *   set_reset(true)  hold; every step() reloads the seed and captures nothing
 *
 * Protocol checks run on the raw inputs of each step outside reset:
 *   start_of_frame without enable  -> 'start_without_enable'
 *   end_of_frame without enable    -> 'end_without_enable' (multi-word mode)
 * They are reported and processing continues, unless the engine is strict.
 *
 * @module crc/crc_engine
 */

import { EventEmitter } from 'events';
import { finalize_value, resolve_engine_config } from './config';
import { ProtocolViolationError } from './errors';
import { EMPTY_SNAPSHOT, capture } from './input_capture';
import { crc32_next_state } from './update_engine';
import type {
  CrcEngineConfig,
  EngineState,
  PipelineSnapshot,
  StepInput,
  StepOutput,
  ViolationKind
} from './types';

/**
 * Events emitted by {@link CrcEngine}.
 *
 * - `'result'`: Finalized CRC on the step `valid` is raised.
 * - `'violation'`: Protocol violations detected on a step (non-strict only).
 * - `'reset'`: Registers were cleared by a {@link CrcEngine.reset} pulse or
 *   by asserting {@link CrcEngine.set_reset}.
 */
export interface CrcEngineEvents {
  result: (crc: number, step: number) => void;
  violation: (violations: ViolationKind[], step: number) => void;
  reset: () => void;
}

/**
 * Word-parallel CRC32 engine with a one-step-delayed handshake.
 *
 * Usage:
 * ```ts
 * const engine = new CrcEngine(PRESET_ETHERNET_FRAME);
 * engine.step({ data_word: 0x12345678, enable: true, start_of_frame: true, end_of_frame: true });
 * const out = engine.step({ data_word: 0, enable: false, start_of_frame: false });
 * // out.valid === true, out.result === 0xAF6D87D2
 * ```
 */
export class CrcEngine extends EventEmitter {
  private readonly config: Readonly<CrcEngineConfig>;
  private accumulator: number;
  private snapshot: PipelineSnapshot = { ...EMPTY_SNAPSHOT };
  private valid: boolean = false;
  private result: number = 0;
  private in_reset: boolean = false;
  private step_count: number = 0;

  /**
   * @param config - Overrides on top of the Ethernet preset.
   * @throws ConfigError if the configuration is invalid.
   */
  constructor(config: Partial<CrcEngineConfig> = {}) {
    super();
    this.config = resolve_engine_config(config);
    this.accumulator = this.config.seed;
  }

  // -----------------------------------------------------------------------
  // Public accessors
  // -----------------------------------------------------------------------

  /** Resolved configuration. */
  get_config(): Readonly<CrcEngineConfig> {
    return this.config;
  }

  /** Copy of every register. */
  get_state(): EngineState {
    return {
      accumulator: this.accumulator,
      snapshot: { ...this.snapshot },
      valid: this.valid,
      result: this.result,
      in_reset: this.in_reset,
      step: this.step_count
    };
  }

  /** Un-finalized running CRC. */
  get_accumulator(): number {
    return this.accumulator;
  }

  /** Last finalized result. Only meaningful while {@link is_valid} is true. */
  get_result(): number {
    return this.result;
  }

  /** True on the single step a result is presented. */
  is_valid(): boolean {
    return this.valid;
  }

  // -----------------------------------------------------------------------
  // Reset
  // -----------------------------------------------------------------------

  /**
   * Non-deferrable reset pulse.
   *
   * Takes effect immediately, before the next step: the accumulator is
   * reloaded with the seed, the captured snapshot is dropped and `valid`
   * is cleared. Does not change the held-reset state.
   */
  reset(): void {
    this._clear_registers();
    this.emit('reset');
  }

  /**
   * Assert or release a held reset.
   *
   * Asserting clears the registers at once and emits `'reset'` on the
   * rising edge; while held, every step keeps them cleared and captures
   * nothing.
   */
  set_reset(asserted: boolean): void {
    const rising = asserted && !this.in_reset;
    this.in_reset = asserted;
    if (asserted) {
      this._clear_registers();
    }
    if (rising) {
      this.emit('reset');
    }
  }

  // -----------------------------------------------------------------------
  // Clock
  // -----------------------------------------------------------------------

  /**
   * Advance one clock step.
   *
   * @param input - Raw inputs for this step.
   * @returns Outputs after the step.
   * @throws ProtocolViolationError in strict mode when the raw inputs
   *   violate the handshake; no state changes in that case.
   */
  step(input: StepInput): StepOutput {
    const step = this.step_count;

    if (this.in_reset) {
      this._clear_registers();
      this.step_count++;
      return { step, result: this.result, valid: false, violations: [] };
    }

    const violations = this._check_protocol(input);
    if (violations.length > 0 && this.config.strict) {
      throw new ProtocolViolationError(violations, step);
    }

    // Output stage consumes the snapshot captured on the previous step
    const captured = this.snapshot;
    if (captured.enable) {
      this.accumulator = crc32_next_state(
        this.accumulator,
        captured.word,
        captured.start_of_frame,
        this.config.polynomial_form,
        this.config.seed
      );
    }

    this.valid = this.config.mode === 'single_word'
      ? captured.enable
      : captured.enable && captured.end_of_frame;

    if (this.valid) {
      this.result = finalize_value(this.accumulator, this.config.finalize);
    }

    this.snapshot = capture(input, false, this.config.mode);
    this.step_count++;

    if (violations.length > 0) {
      this.emit('violation', violations, step);
    }
    if (this.valid) {
      this.emit('result', this.result, step);
    }

    return { step, result: this.result, valid: this.valid, violations };
  }

  /**
   * Step with every input deasserted. Drains the pipeline after the last
   * word of a stream.
   */
  idle(): StepOutput {
    return this.step({ data_word: 0, enable: false, start_of_frame: false, end_of_frame: false });
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  /** Precondition checks on the raw, un-captured inputs. */
  private _check_protocol(input: StepInput): ViolationKind[] {
    const violations: ViolationKind[] = [];
    if (input.start_of_frame && !input.enable) {
      violations.push('start_without_enable');
    }
    if (this.config.mode === 'multi_word_frame' && input.end_of_frame === true && !input.enable) {
      violations.push('end_without_enable');
    }
    return violations;
  }

  private _clear_registers(): void {
    this.accumulator = this.config.seed;
    this.snapshot = capture({ data_word: 0, enable: false, start_of_frame: false }, true, this.config.mode);
    this.valid = false;
  }
}
