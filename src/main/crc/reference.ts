/**
 * Byte-serial reference CRC32.
 *
 * Classic table-driven implementation, one byte per iteration, used to
 * cross-check the word-parallel engine. With the matching byte layout:
 *
 *   reversed + complement == CRC-32/ISO-HDLC (Ethernet, zlib) over the
 *                            little-endian bytes of each word
 *   forward  + identity   == CRC-32/MPEG-2 over the big-endian bytes
 *
 * @module crc/reference
 */

import { CRC32_POLY_FORWARD, CRC32_POLY_REVERSED, WORD_BYTES } from './constants';
import { byte_order_for, finalize_value } from './config';
import type { ByteOrder, CrcEngineConfig } from './types';

/** Parameters of a byte-serial run. */
export type ReferenceParams = Pick<CrcEngineConfig, 'polynomial_form' | 'seed' | 'finalize'>;

// ---------------------------------------------------------------------------
// Lookup tables
// ---------------------------------------------------------------------------

function build_reversed_table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? (CRC32_POLY_REVERSED ^ (c >>> 1)) >>> 0 : c >>> 1;
    }
    table[n] = c;
  }
  return table;
}

function build_forward_table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = (n << 24) >>> 0;
    for (let k = 0; k < 8; k++) {
      c = c & 0x80000000 ? ((c << 1) ^ CRC32_POLY_FORWARD) >>> 0 : (c << 1) >>> 0;
    }
    table[n] = c;
  }
  return table;
}

const REVERSED_TABLE = build_reversed_table();
const FORWARD_TABLE = build_forward_table();

// ---------------------------------------------------------------------------
// Reference CRC
// ---------------------------------------------------------------------------

/**
 * Compute the CRC of a byte stream one byte at a time.
 *
 * @param bytes - Byte stream in transmission order.
 * @param params - Polynomial form, seed and finalization.
 * @returns 32-bit unsigned CRC.
 */
export function reference_crc32(bytes: Uint8Array, params: ReferenceParams): number {
  let crc = params.seed >>> 0;

  if (params.polynomial_form === 'reversed') {
    for (let i = 0; i < bytes.length; i++) {
      crc = (REVERSED_TABLE[(crc ^ bytes[i]) & 0xFF] ^ (crc >>> 8)) >>> 0;
    }
  } else {
    for (let i = 0; i < bytes.length; i++) {
      crc = (FORWARD_TABLE[((crc >>> 24) ^ bytes[i]) & 0xFF] ^ (crc << 8)) >>> 0;
    }
  }

  return finalize_value(crc, params.finalize);
}

/**
 * Expected result for one frame of words under an engine configuration.
 *
 * Words are laid out with {@link byte_order_for} the configured form.
 */
export function reference_frame_crc(words: readonly number[], params: ReferenceParams): number {
  return reference_crc32(words_to_bytes(words, byte_order_for(params.polynomial_form)), params);
}

// ---------------------------------------------------------------------------
// Word / byte layout
// ---------------------------------------------------------------------------

/** Split words into their bytes in stream order. */
export function words_to_bytes(words: readonly number[], order: ByteOrder): Uint8Array {
  const out = new Uint8Array(words.length * WORD_BYTES);
  const view = new DataView(out.buffer);
  words.forEach((word, i) => {
    view.setUint32(i * WORD_BYTES, word >>> 0, order === 'little_endian');
  });
  return out;
}

/**
 * Pack a byte stream into words.
 *
 * @throws RangeError if the length is not a multiple of 4.
 */
export function bytes_to_words(bytes: Uint8Array, order: ByteOrder): number[] {
  if (bytes.length % WORD_BYTES !== 0) {
    throw new RangeError(`bytes_to_words: length ${bytes.length} is not a multiple of ${WORD_BYTES}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const words: number[] = [];
  for (let offset = 0; offset < bytes.length; offset += WORD_BYTES) {
    words.push(view.getUint32(offset, order === 'little_endian'));
  }
  return words;
}
