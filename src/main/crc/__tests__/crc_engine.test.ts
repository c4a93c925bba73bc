/**
 * Tests for the CRC engine's output / protocol stage.
 *
 * Covers the golden vector for both presets, the one-step latency of
 * accumulator and valid, back-to-back frames, idle steps inside a frame,
 * reset pulse and held reset, protocol violations (reporting and strict
 * mode), event emission, randomized equivalence with the reference and
 * single-bit avalanche over whole frames.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import fc from 'fast-check';
import { CrcEngine } from '../crc_engine';
import { PRESET_ETHERNET_FRAME, PRESET_FORWARD_SINGLE_WORD } from '../config';
import { ProtocolViolationError } from '../errors';
import { reference_frame_crc } from '../reference';
import { CRC32_SEED } from '../constants';
import type { CrcEngineConfig, StepInput, StepOutput } from '../types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Enabled word with optional frame flags. */
function word(data_word: number, flags: { sof?: boolean; eof?: boolean } = {}): StepInput {
  return {
    data_word,
    enable: true,
    start_of_frame: flags.sof ?? false,
    end_of_frame: flags.eof ?? false
  };
}

/** Drive a whole frame back-to-back; returns the outputs of each step. */
function drive_frame(engine: CrcEngine, words: number[]): StepOutput[] {
  return words.map((w, i) => engine.step(word(w, { sof: i === 0, eof: i === words.length - 1 })));
}

// ---------------------------------------------------------------------------
// Ethernet preset (reversed, multi-word frame, complement)
// ---------------------------------------------------------------------------

describe('CrcEngine (Ethernet preset)', () => {
  let engine: CrcEngine;

  beforeEach(() => {
    engine = new CrcEngine(PRESET_ETHERNET_FRAME);
  });

  it('should start in the reset state', () => {
    expect(engine.get_state()).toEqual({
      accumulator: CRC32_SEED,
      snapshot: { word: 0, enable: false, start_of_frame: false, end_of_frame: false },
      valid: false,
      result: 0,
      in_reset: false,
      step: 0
    });
  });

  it('should produce the golden CRC for a single-word frame 0x12345678', () => {
    const first = engine.step(word(0x12345678, { sof: true, eof: true }));
    expect(first.valid).toBe(false);

    const second = engine.idle();
    expect(second).toEqual({ step: 1, result: 0xAF6D87D2, valid: true, violations: [] });
  });

  it('should change the result when one input bit flips', () => {
    engine.step(word(0x12345679, { sof: true, eof: true }));
    expect(engine.idle().result).toBe(0x17D1E0B7);
  });

  it('should compute a two-word frame', () => {
    drive_frame(engine, [0x12345678, 0x9ABCDEF0]);
    expect(engine.idle().result).toBe(0x86829DEB);
  });

  it('should hold the all-zero and all-ones single-word results', () => {
    engine.step(word(0x00000000, { sof: true, eof: true }));
    engine.step(word(0xFFFFFFFF, { sof: true, eof: true }));
    expect(engine.get_result()).toBe(0x2144DF1C);
    expect(engine.idle().result).toBe(0xFFFFFFFF);
  });

  // --- Latency -------------------------------------------------------------

  it('should update the accumulator exactly one step after capture', () => {
    engine.step(word(0x12345678, { sof: true }));
    expect(engine.get_accumulator()).toBe(CRC32_SEED);

    engine.idle();
    expect(engine.get_accumulator()).toBe(0x5092782D);
  });

  it('should raise valid exactly one step after the end-of-frame word', () => {
    const outputs = [
      ...drive_frame(engine, [0x12345678, 0x9ABCDEF0]),
      engine.idle(),
      engine.idle()
    ];
    expect(outputs.map((o) => o.valid)).toEqual([false, false, true, false]);
    expect(outputs[2].result).toBe(0x86829DEB);
  });

  it('should not raise valid for words before the last one', () => {
    const outputs = drive_frame(engine, [1, 2, 3, 4]);
    outputs.push(engine.step(word(5)));
    expect(outputs.every((o) => !o.valid || o.step === 4)).toBe(true);
    expect(outputs[4].valid).toBe(true);
  });

  // --- Frame sequencing ------------------------------------------------------

  it('should handle back-to-back frames without an idle step', () => {
    const a = drive_frame(engine, [0x12345678, 0x9ABCDEF0]);
    const b = drive_frame(engine, [0xDEADBEEF]);
    const tail = engine.idle();

    expect(a.map((o) => o.valid)).toEqual([false, false]);
    expect(b[0]).toMatchObject({ valid: true, result: 0x86829DEB });
    expect(tail).toMatchObject({ valid: true, result: 0x1A5A601F });
  });

  it('should hold the accumulator across idle steps inside a frame', () => {
    engine.step(word(0x12345678, { sof: true }));
    engine.idle();
    engine.idle();
    engine.step(word(0x9ABCDEF0, { eof: true }));
    expect(engine.idle().result).toBe(0x86829DEB);
  });

  it('should reseed when a new start arrives on an unfinished frame', () => {
    engine.step(word(0x11111111, { sof: true }));
    engine.step(word(0x12345679, { sof: true, eof: true }));
    expect(engine.idle().result).toBe(0x17D1E0B7);
  });

  it('should keep absorbing words when no end-of-frame arrives', () => {
    engine.step(word(0x12345678, { sof: true }));
    engine.step(word(0x9ABCDEF0));
    const out = engine.idle();
    expect(out.valid).toBe(false);
    expect(engine.get_accumulator()).toBe(0x797D6214);
  });

  it('should keep the previous result after valid drops', () => {
    engine.step(word(0x12345678, { sof: true, eof: true }));
    engine.idle();
    const later = engine.idle();
    expect(later).toMatchObject({ valid: false, result: 0xAF6D87D2 });
    expect(engine.is_valid()).toBe(false);
  });

  // --- Reset -----------------------------------------------------------------

  it('should drop an in-flight end-of-frame word on reset()', () => {
    engine.step(word(0x12345678, { sof: true, eof: true }));
    engine.reset();

    const out = engine.idle();
    expect(out.valid).toBe(false);
    expect(engine.get_accumulator()).toBe(CRC32_SEED);
  });

  it('should reload the seed mid-frame on reset()', () => {
    engine.step(word(0x12345678, { sof: true }));
    engine.idle();
    expect(engine.get_accumulator()).toBe(0x5092782D);

    engine.reset();
    expect(engine.get_state()).toMatchObject({ accumulator: CRC32_SEED, valid: false });
  });

  it('should clear valid immediately on reset()', () => {
    engine.step(word(0x12345678, { sof: true, eof: true }));
    engine.idle();
    expect(engine.is_valid()).toBe(true);

    engine.reset();
    expect(engine.is_valid()).toBe(false);
  });

  it('should emit reset', () => {
    const on_reset = vi.fn();
    engine.on('reset', on_reset);
    engine.reset();
    expect(on_reset).toHaveBeenCalledTimes(1);
  });

  it('should emit reset once when a held reset is asserted', () => {
    const on_reset = vi.fn();
    engine.on('reset', on_reset);
    engine.set_reset(true);
    engine.set_reset(true);
    engine.idle();
    expect(on_reset).toHaveBeenCalledTimes(1);
    engine.set_reset(false);
    expect(on_reset).toHaveBeenCalledTimes(1);
    engine.set_reset(true);
    expect(on_reset).toHaveBeenCalledTimes(2);
  });

  it('should ignore inputs while reset is held', () => {
    engine.set_reset(true);
    const held = [
      engine.step(word(0x12345678, { sof: true, eof: true })),
      engine.step(word(0x12345678, { sof: true, eof: true }))
    ];
    engine.set_reset(false);
    const after = engine.idle();

    expect(held.map((o) => o.valid)).toEqual([false, false]);
    expect(after.valid).toBe(false);
    expect(engine.get_state()).toMatchObject({ accumulator: CRC32_SEED, in_reset: false, step: 3 });
  });

  it('should not check the protocol while reset is held', () => {
    engine.set_reset(true);
    const out = engine.step({ data_word: 0, enable: false, start_of_frame: true, end_of_frame: true });
    expect(out.violations).toEqual([]);
  });

  it('should work normally after reset is released', () => {
    engine.set_reset(true);
    engine.idle();
    engine.set_reset(false);
    engine.step(word(0x12345678, { sof: true, eof: true }));
    expect(engine.idle()).toMatchObject({ valid: true, result: 0xAF6D87D2 });
  });

  // --- Protocol checks -------------------------------------------------------

  it('should report start-of-frame without enable', () => {
    const out = engine.step({ data_word: 0xDEADBEEF, enable: false, start_of_frame: true });
    expect(out.violations).toEqual(['start_without_enable']);
  });

  it('should report end-of-frame without enable', () => {
    const out = engine.step({ data_word: 0, enable: false, start_of_frame: false, end_of_frame: true });
    expect(out.violations).toEqual(['end_without_enable']);
  });

  it('should report both violations in order', () => {
    const out = engine.step({ data_word: 0, enable: false, start_of_frame: true, end_of_frame: true });
    expect(out.violations).toEqual(['start_without_enable', 'end_without_enable']);
  });

  it('should not let a violating step change the accumulator', () => {
    engine.step(word(0x12345678, { sof: true, eof: true }));
    const bad = engine.step({ data_word: 0xDEADBEEF, enable: false, start_of_frame: true });
    const next = engine.idle();

    expect(bad).toMatchObject({ valid: true, result: 0xAF6D87D2, violations: ['start_without_enable'] });
    expect(next.valid).toBe(false);
    expect(engine.get_accumulator()).toBe(0x5092782D);
  });

  it('should emit violation with the step index', () => {
    const on_violation = vi.fn();
    engine.on('violation', on_violation);
    engine.idle();
    engine.step({ data_word: 0, enable: false, start_of_frame: true });
    expect(on_violation).toHaveBeenCalledWith(['start_without_enable'], 1);
  });

  it('should emit result with the step index', () => {
    const on_result = vi.fn();
    engine.on('result', on_result);
    engine.step(word(0x12345678, { sof: true, eof: true }));
    engine.idle();
    expect(on_result).toHaveBeenCalledTimes(1);
    expect(on_result).toHaveBeenCalledWith(0xAF6D87D2, 1);
  });
});

// ---------------------------------------------------------------------------
// Strict mode
// ---------------------------------------------------------------------------

describe('CrcEngine (strict)', () => {
  it('should throw ProtocolViolationError and leave state untouched', () => {
    const engine = new CrcEngine({ ...PRESET_ETHERNET_FRAME, strict: true });
    engine.step(word(0x12345678, { sof: true }));
    const before = engine.get_state();

    expect(() => engine.step({ data_word: 0, enable: false, start_of_frame: true })).toThrow(ProtocolViolationError);
    expect(engine.get_state()).toEqual(before);
  });

  it('should carry the violations and step on the error', () => {
    const engine = new CrcEngine({ strict: true });
    let caught: unknown = null;
    try {
      engine.step({ data_word: 0, enable: false, start_of_frame: false, end_of_frame: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProtocolViolationError);
    expect(caught).toMatchObject({ violations: ['end_without_enable'], step: 0 });
  });
});

// ---------------------------------------------------------------------------
// Forward preset (forward, single word, identity)
// ---------------------------------------------------------------------------

describe('CrcEngine (forward single-word preset)', () => {
  let engine: CrcEngine;

  beforeEach(() => {
    engine = new CrcEngine(PRESET_FORWARD_SINGLE_WORD);
  });

  it('should produce the golden raw CRC for 0x12345678', () => {
    engine.step(word(0x12345678, { sof: true }));
    expect(engine.idle()).toEqual({ step: 1, result: 0xDF8A8A2B, valid: true, violations: [] });
  });

  it('should present a result for every enabled word', () => {
    const outputs = [
      engine.step(word(0x12345678, { sof: true })),
      engine.step(word(0x9ABCDEF0)),
      engine.idle(),
      engine.idle()
    ];
    expect(outputs.map((o) => o.valid)).toEqual([false, true, true, false]);
    expect(outputs[1].result).toBe(0xDF8A8A2B);
    // No start on the second word: it accumulates on the first
    expect(outputs[2].result).toBe(0x7D24A31B);
  });

  it('should ignore end-of-frame entirely', () => {
    const out = engine.step({ data_word: 0, enable: false, start_of_frame: false, end_of_frame: true });
    expect(out.violations).toEqual([]);
    expect(engine.get_state().snapshot.end_of_frame).toBe(false);
  });

  it('should still report start-of-frame without enable', () => {
    const out = engine.step({ data_word: 0, enable: false, start_of_frame: true });
    expect(out.violations).toEqual(['start_without_enable']);
  });
});

// ---------------------------------------------------------------------------
// Randomized equivalence with the byte-serial reference
// ---------------------------------------------------------------------------

describe('CrcEngine equivalence', () => {
  const frames = fc.array(
    fc.array(fc.integer({ min: 0, max: 0xFFFFFFFF }), { minLength: 1, maxLength: 10 }),
    { minLength: 1, maxLength: 5 }
  );

  it('should match the reference for back-to-back random frames (Ethernet preset)', () => {
    fc.assert(
      fc.property(frames, (frame_list) => {
        const engine = new CrcEngine(PRESET_ETHERNET_FRAME);
        const results: number[] = [];
        engine.on('result', (crc: number) => results.push(crc));

        frame_list.forEach((f) => drive_frame(engine, f));
        engine.idle();

        expect(results).toEqual(frame_list.map((f) => reference_frame_crc(f, PRESET_ETHERNET_FRAME)));
      }),
      { numRuns: 100 }
    );
  });

  it('should match the reference word by word (forward preset)', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 0xFFFFFFFF }), { minLength: 1, maxLength: 10 }), (words) => {
        const engine = new CrcEngine(PRESET_FORWARD_SINGLE_WORD);
        const results: number[] = [];
        engine.on('result', (crc: number) => results.push(crc));

        words.forEach((w) => engine.step(word(w, { sof: true })));
        engine.idle();

        expect(results).toEqual(words.map((w) => reference_frame_crc([w], PRESET_FORWARD_SINGLE_WORD)));
      }),
      { numRuns: 100 }
    );
  });
});

// ---------------------------------------------------------------------------
// Avalanche over whole frames
// ---------------------------------------------------------------------------

describe('CrcEngine avalanche', () => {
  const frame_and_flip = fc.record({
    words: fc.array(fc.integer({ min: 0, max: 0xFFFFFFFF }), { minLength: 1, maxLength: 10 }),
    index: fc.nat(),
    bit: fc.integer({ min: 0, max: 31 })
  });

  /** Finalized result of one frame driven through a fresh engine. */
  function frame_result(config: Partial<CrcEngineConfig>, words: number[]): number {
    const engine = new CrcEngine(config);
    drive_frame(engine, words);
    const out = engine.idle();
    expect(out.valid).toBe(true);
    return out.result;
  }

  it('should change the frame result for a single-bit flip in any word', () => {
    fc.assert(
      fc.property(frame_and_flip, ({ words, index, bit }) => {
        const flipped = [...words];
        const at = index % words.length;
        flipped[at] = (flipped[at] ^ (1 << bit)) >>> 0;

        expect(frame_result(PRESET_ETHERNET_FRAME, flipped)).not.toBe(frame_result(PRESET_ETHERNET_FRAME, words));
      }),
      { numRuns: 200 }
    );
  });

  it('should change the frame result under the forward form too', () => {
    const forward_frames: Partial<CrcEngineConfig> = { ...PRESET_FORWARD_SINGLE_WORD, mode: 'multi_word_frame' };
    fc.assert(
      fc.property(frame_and_flip, ({ words, index, bit }) => {
        const flipped = [...words];
        const at = index % words.length;
        flipped[at] = (flipped[at] ^ (1 << bit)) >>> 0;

        expect(frame_result(forward_frames, flipped)).not.toBe(frame_result(forward_frames, words));
      }),
      { numRuns: 200 }
    );
  });
});
