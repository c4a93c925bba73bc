/**
 * Constants for the word-parallel CRC32 engine.
 *
 * Polynomials, seed, simulation defaults and serial link parameters.
 *
 * @module crc/constants
 */

// ---------------------------------------------------------------------------
// CRC32 parameters (IEEE 802.3)
// ---------------------------------------------------------------------------

/** Forward generator polynomial, paired with MSB-first processing. */
export const CRC32_POLY_FORWARD = 0x04C11DB7;

/** Bit-reversed generator polynomial, paired with LSB-first processing. */
export const CRC32_POLY_REVERSED = 0xEDB88320;

/** Accumulator value at reset and at the start of every frame. */
export const CRC32_SEED = 0xFFFFFFFF;

/** All 32 bits set. */
export const CRC32_MASK = 0xFFFFFFFF;

/** Bits folded into the accumulator per step. */
export const WORD_BITS = 32;

/** Bytes per data word. */
export const WORD_BYTES = 4;

// ---------------------------------------------------------------------------
// Simulation defaults
// ---------------------------------------------------------------------------

/** Steps the simulation holds reset before driving the first frame. */
export const SIM_RESET_STEPS = 5;

/** Number of randomized frames in a default self-test run. */
export const SIM_DEFAULT_TRIALS = 100;

/** Shortest randomized frame, in words. */
export const SIM_MIN_FRAME_WORDS = 1;

/** Longest randomized frame, in words. */
export const SIM_MAX_FRAME_WORDS = 10;

/** Longest idle gap inserted between frames when gaps are enabled. */
export const SIM_MAX_IDLE_GAP = 3;

/** Default PRNG seed for reproducible runs. */
export const SIM_DEFAULT_SEED = 0x1234ABCD;

/** Extra steps allowed past the scripted sequence before the watchdog fires. */
export const SIM_WATCHDOG_SLACK_STEPS = 16;
