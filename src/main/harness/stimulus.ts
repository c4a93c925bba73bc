/**
 * Stimulus generation: deterministic random words and frames, and the
 * step sequences that drive them through the engine.
 *
 * @module harness/stimulus
 */

import type { FrameMode, StepInput } from '../crc/types';

/**
 * Seeded xorshift32 generator. Same seed, same sequence; never yields
 * a zero state.
 */
export class Stimulus {
  private state: number;

  constructor(seed: number) {
    // xorshift32 is stuck at zero
    this.state = (seed >>> 0) || 0x9E3779B9;
  }

  /** Next raw 32-bit value. */
  next_u32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Uniform integer in `min..max` inclusive. */
  next_int(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`Stimulus: empty range ${min}..${max}`);
    }
    return min + (this.next_u32() % (max - min + 1));
  }

  random_word(): number {
    return this.next_u32();
  }

  /** Random frame of `min_words..max_words` words. */
  random_frame(min_words: number, max_words: number): number[] {
    const length = this.next_int(min_words, max_words);
    const words: number[] = [];
    for (let i = 0; i < length; i++) {
      words.push(this.random_word());
    }
    return words;
  }
}

/**
 * Steps that submit one frame.
 *
 * Multi-word mode: start on the first word, end on the last, enable on
 * all. Single-word mode has no frame boundary, so each word is its own
 * start-flagged submission.
 */
export function frame_to_steps(words: readonly number[], mode: FrameMode): StepInput[] {
  if (mode === 'single_word') {
    return words.map((word) => ({ data_word: word >>> 0, enable: true, start_of_frame: true }));
  }

  return words.map((word, i) => ({
    data_word: word >>> 0,
    enable: true,
    start_of_frame: i === 0,
    end_of_frame: i === words.length - 1
  }));
}

/** A step with every input deasserted. */
export function idle_step(): StepInput {
  return { data_word: 0, enable: false, start_of_frame: false, end_of_frame: false };
}
