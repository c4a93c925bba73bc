/**
 * In-order scoreboard of expected frame CRCs.
 *
 * The driver pushes the reference CRC of every frame it submits; the
 * monitor checks each valid result against the oldest outstanding entry.
 * A result with nothing outstanding is an underflow.
 *
 * @module harness/scoreboard
 */

import { ScoreboardError } from '../crc/errors';
import type { ScoreboardCheck, ScoreboardEntry, ScoreboardSummary } from './harness_types';

export class Scoreboard {
  private queue: ScoreboardEntry[] = [];
  private matched: number = 0;
  private mismatched: number = 0;
  private underflows: number = 0;
  private submitted: number = 0;
  private readonly strict: boolean;

  /**
   * @param strict - Throw {@link ScoreboardError} on underflow or mismatch
   *   instead of counting it.
   */
  constructor(strict: boolean = false) {
    this.strict = strict;
  }

  /** Queue the expected CRC of a submitted frame. */
  expect(crc: number, tag?: string): void {
    this.queue.push({ crc: crc >>> 0, tag: tag ?? `frame${this.submitted}` });
    this.submitted++;
  }

  /**
   * Check a valid result against the oldest expected frame.
   *
   * @param actual - Result presented with `valid`.
   * @param step - Step on which it was presented.
   */
  check(actual: number, step: number): ScoreboardCheck {
    const entry = this.queue.shift();

    if (entry === undefined) {
      this.underflows++;
      if (this.strict) {
        throw new ScoreboardError('underflow', `result 0x${hex32(actual)} at step ${step} with no frame outstanding`);
      }
      return { status: 'underflow', actual: actual >>> 0, step };
    }

    if ((actual >>> 0) === entry.crc) {
      this.matched++;
      return { status: 'match', actual: actual >>> 0, expected: entry.crc, tag: entry.tag, step };
    }

    this.mismatched++;
    if (this.strict) {
      throw new ScoreboardError(
        'mismatch',
        `${entry.tag}: expected 0x${hex32(entry.crc)}, got 0x${hex32(actual)} at step ${step}`
      );
    }
    return { status: 'mismatch', actual: actual >>> 0, expected: entry.crc, tag: entry.tag, step };
  }

  /** Frames submitted but not yet checked. */
  pending(): number {
    return this.queue.length;
  }

  summary(): ScoreboardSummary {
    return {
      matched: this.matched,
      mismatched: this.mismatched,
      underflows: this.underflows,
      pending: this.queue.length
    };
  }
}

/** Zero-padded upper-case hex of a u32. */
export function hex32(value: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(8, '0');
}
