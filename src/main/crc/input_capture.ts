/**
 * Input capture stage.
 *
 * Latches the raw step inputs so the update logic always works on a
 * stable, one-step-delayed copy.
 *
 * @module crc/input_capture
 */

import type { FrameMode, PipelineSnapshot, StepInput } from './types';

/** Snapshot held while reset is asserted. */
export const EMPTY_SNAPSHOT: Readonly<PipelineSnapshot> = Object.freeze({
  word: 0,
  enable: false,
  start_of_frame: false,
  end_of_frame: false
});

/**
 * Capture one step's raw inputs.
 *
 * The end-of-frame flag only exists in multi-word-frame mode; in
 * single-word mode it is captured as false whatever the caller passed.
 */
export function capture(input: StepInput, in_reset: boolean, mode: FrameMode): PipelineSnapshot {
  if (in_reset) {
    return { ...EMPTY_SNAPSHOT };
  }

  return {
    word: input.data_word >>> 0,
    enable: input.enable,
    start_of_frame: input.start_of_frame,
    end_of_frame: mode === 'multi_word_frame' && input.end_of_frame === true
  };
}
