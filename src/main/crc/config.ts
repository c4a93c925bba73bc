/**
 * Engine configuration: presets, defaults and validation.
 *
 * Two presets cover the variants in use:
 *   - forward polynomial, single-word results, no finalization
 *   - reversed polynomial, multi-word frames, complemented result (Ethernet)
 *
 * @module crc/config
 */

import { CRC32_POLY_FORWARD, CRC32_POLY_REVERSED, CRC32_SEED, CRC32_MASK } from './constants';
import { ConfigError } from './errors';
import type { ByteOrder, CrcEngineConfig, Finalize, FrameMode, PolynomialForm } from './types';

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

/** MSB-first, one result per word, raw accumulator out. */
export const PRESET_FORWARD_SINGLE_WORD: Readonly<CrcEngineConfig> = Object.freeze({
  polynomial_form: 'forward',
  seed: CRC32_SEED,
  mode: 'single_word',
  finalize: 'identity',
  strict: false
});

/** LSB-first, one result per frame, complemented (IEEE 802.3 FCS). */
export const PRESET_ETHERNET_FRAME: Readonly<CrcEngineConfig> = Object.freeze({
  polynomial_form: 'reversed',
  seed: CRC32_SEED,
  mode: 'multi_word_frame',
  finalize: 'complement',
  strict: false
});

/** Presets by CLI name. */
export const PRESETS: Readonly<Record<'ethernet' | 'forward', Readonly<CrcEngineConfig>>> = {
  ethernet: PRESET_ETHERNET_FRAME,
  forward: PRESET_FORWARD_SINGLE_WORD
};

const POLYNOMIAL_FORMS: readonly PolynomialForm[] = ['forward', 'reversed'];
const FRAME_MODES: readonly FrameMode[] = ['single_word', 'multi_word_frame'];
const FINALIZE_KINDS: readonly Finalize[] = ['identity', 'complement'];

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Fill missing fields from the Ethernet preset and validate the result.
 *
 * @param partial - Fields to override. Omitted or undefined fields take the
 *   preset value.
 * @returns Frozen, fully populated configuration.
 * @throws ConfigError naming the first invalid field.
 */
export function resolve_engine_config(partial: Partial<CrcEngineConfig> = {}): Readonly<CrcEngineConfig> {
  const base = PRESET_ETHERNET_FRAME;
  const config: CrcEngineConfig = {
    polynomial_form: partial.polynomial_form !== undefined ? partial.polynomial_form : base.polynomial_form,
    seed: partial.seed !== undefined ? partial.seed : base.seed,
    mode: partial.mode !== undefined ? partial.mode : base.mode,
    finalize: partial.finalize !== undefined ? partial.finalize : base.finalize,
    strict: partial.strict !== undefined ? partial.strict : base.strict
  };

  if (!POLYNOMIAL_FORMS.includes(config.polynomial_form)) {
    throw new ConfigError('polynomial_form', `expected one of ${POLYNOMIAL_FORMS.join(', ')}, got ${String(config.polynomial_form)}`);
  }
  if (!FRAME_MODES.includes(config.mode)) {
    throw new ConfigError('mode', `expected one of ${FRAME_MODES.join(', ')}, got ${String(config.mode)}`);
  }
  if (!FINALIZE_KINDS.includes(config.finalize)) {
    throw new ConfigError('finalize', `expected one of ${FINALIZE_KINDS.join(', ')}, got ${String(config.finalize)}`);
  }
  if (!Number.isInteger(config.seed) || config.seed < 0 || config.seed > CRC32_MASK) {
    throw new ConfigError('seed', `expected an integer in 0..0xFFFFFFFF, got ${String(config.seed)}`);
  }
  if (typeof config.strict !== 'boolean') {
    throw new ConfigError('strict', `expected a boolean, got ${String(config.strict)}`);
  }

  return Object.freeze(config);
}

/** Generator constant paired with a polynomial form. */
export function polynomial_for(form: PolynomialForm): number {
  return form === 'forward' ? CRC32_POLY_FORWARD : CRC32_POLY_REVERSED;
}

/**
 * Byte layout under which the word stream equals the byte stream a
 * byte-serial reference sees: MSB-first folding consumes the high byte
 * first, LSB-first folding the low byte first.
 */
export function byte_order_for(form: PolynomialForm): ByteOrder {
  return form === 'forward' ? 'big_endian' : 'little_endian';
}

/** Apply the configured finalization to an accumulator value. */
export function finalize_value(accumulator: number, finalize: Finalize): number {
  return finalize === 'complement' ? (~accumulator) >>> 0 : accumulator >>> 0;
}
