/**
 * CRC update engine: bit-parallel next-state function.
 *
 * Emulates 32 steps of a bit-serial Galois LFSR in one call. Each fold
 * compares the register's outgoing bit with the next data bit; when they
 * differ the shifted register is XORed with the generator.
 *
 *   forward  (0x04C11DB7): outgoing bit 31, data bits 31..0, shift left
 *   reversed (0xEDB88320): outgoing bit 0,  data bits 0..31, shift right
 *
 * The two forms are mirror images: folding the bit-reversed word into the
 * bit-reversed register with the reversed polynomial gives the bit-reversed
 * forward result. Mixing a polynomial with the other form's bit order gives
 * wrong results.
 *
 * @module crc/update_engine
 */

import { CRC32_POLY_FORWARD, CRC32_POLY_REVERSED, WORD_BITS } from './constants';
import type { PolynomialForm } from './types';

/**
 * Fold a 32-bit word into the register, MSB-first, forward polynomial.
 *
 * @param value - Register before the word (u32).
 * @param word - Data word (u32); bit 31 is consumed first.
 * @returns Register after 32 folds (u32).
 */
export function crc32_fold_forward(value: number, word: number): number {
  let v = value >>> 0;

  for (let i = 0; i < WORD_BITS; i++) {
    const data_bit = (word >>> (31 - i)) & 1;
    const top_bit = v >>> 31;

    if (top_bit !== data_bit) {
      v = ((v << 1) ^ CRC32_POLY_FORWARD) >>> 0;
    } else {
      v = (v << 1) >>> 0;
    }
  }

  return v;
}

/**
 * Fold a 32-bit word into the register, LSB-first, reversed polynomial.
 *
 * @param value - Register before the word (u32).
 * @param word - Data word (u32); bit 0 is consumed first.
 * @returns Register after 32 folds (u32).
 */
export function crc32_fold_reversed(value: number, word: number): number {
  let v = value >>> 0;

  for (let i = 0; i < WORD_BITS; i++) {
    const data_bit = (word >>> i) & 1;
    const bottom_bit = v & 1;

    if (bottom_bit !== data_bit) {
      v = ((v >>> 1) ^ CRC32_POLY_REVERSED) >>> 0;
    } else {
      v = v >>> 1;
    }
  }

  return v;
}

/**
 * Compute the next accumulator value from the captured word.
 *
 * Pure: no state of its own, total over all u32 inputs.
 *
 * @param accumulator - Current accumulator (u32).
 * @param word - Captured data word (u32).
 * @param start - Captured start-of-frame flag; folds from `seed` instead of the accumulator.
 * @param form - Polynomial representation and matching bit order.
 * @param seed - Frame seed (u32).
 * @returns Next accumulator value (u32).
 */
export function crc32_next_state(
  accumulator: number,
  word: number,
  start: boolean,
  form: PolynomialForm,
  seed: number
): number {
  const base = start ? seed : accumulator;
  return form === 'forward' ? crc32_fold_forward(base, word) : crc32_fold_reversed(base, word);
}

/** Mirror the 32 bits of a value (bit 0 <-> bit 31). */
export function reverse_bits32(value: number): number {
  let v = value >>> 0;
  v = ((v >>> 1) & 0x55555555) | ((v & 0x55555555) << 1);
  v = ((v >>> 2) & 0x33333333) | ((v & 0x33333333) << 2);
  v = ((v >>> 4) & 0x0F0F0F0F) | ((v & 0x0F0F0F0F) << 4);
  v = ((v >>> 8) & 0x00FF00FF) | ((v & 0x00FF00FF) << 8);
  v = (v >>> 16) | (v << 16);
  return v >>> 0;
}
