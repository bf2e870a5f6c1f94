import { clampScore } from './scoring';
import { Direction, IndicatorFrame } from './types';

export interface AdvisoryInput {
  instrument: string;
  frame: IndicatorFrame;
  direction: Direction;
  baseScore: number;
}

/**
 * Optional score modifier (for example an external model's opinion). Whatever it
 * returns is bounded by the rubric's `advisoryMaxAdjustment`; it cannot accept a
 * candidate on its own.
 */
export interface AdvisoryOverlay {
  readonly name: string;
  adjust(input: AdvisoryInput): number;
}

export interface AdvisoryResult {
  adjustment: number;
  confidenceScore: number;
}

export function applyAdvisory(
  overlay: AdvisoryOverlay | undefined,
  input: AdvisoryInput,
  maxAdjustment: number,
): AdvisoryResult {
  if (!overlay) {
    return { adjustment: 0, confidenceScore: input.baseScore };
  }

  const raw = overlay.adjust(input);
  // Scores are whole points.
  const adjustment = Number.isFinite(raw) ? Math.round(Math.min(maxAdjustment, Math.max(-maxAdjustment, raw))) : 0;
  return { adjustment, confidenceScore: clampScore(input.baseScore + adjustment) };
}
