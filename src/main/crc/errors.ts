/**
 * Error types thrown by the CRC engine and its harness.
 *
 * @module crc/errors
 */

import type { ViolationKind } from './types';

/** Invalid engine configuration. Thrown at construction. */
export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`CrcEngine: invalid ${field}: ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

/** Raised by a strict engine instead of reporting a violation. */
export class ProtocolViolationError extends Error {
  readonly violations: ViolationKind[];
  readonly step: number;

  constructor(violations: ViolationKind[], step: number) {
    super(`CrcEngine: protocol violation at step ${step}: ${violations.join(', ')}`);
    this.name = 'ProtocolViolationError';
    this.violations = violations;
    this.step = step;
  }
}

/** Scoreboard underflow, or a mismatch when the scoreboard is strict. */
export class ScoreboardError extends Error {
  readonly kind: 'underflow' | 'mismatch';

  constructor(kind: 'underflow' | 'mismatch', message: string) {
    super(`Scoreboard: ${message}`);
    this.name = 'ScoreboardError';
    this.kind = kind;
  }
}
