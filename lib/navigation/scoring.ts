import type {
  Detection,
  Direction,
  DistanceCategory,
  Guidance,
} from '@/types/navigation';
import type { LegacyConfig } from './config';

/**
 * Scoring path
 *
 * The simpler pipeline used when partition geometry is not wanted: filter,
 * bucket each survivor into a direction and a distance category, score it,
 * and keep the single highest-priority object.
 */

// Direction boundaries (normalized x)
const LEFT_BOUNDARY = 0.33;
const RIGHT_BOUNDARY = 0.66;

// Priority weights
const CONFIDENCE_WEIGHT = 2;
const DISTANCE_WEIGHT = 3;
const CENTER_DIRECTION_WEIGHT = 4;
const SIDE_DIRECTION_WEIGHT = 1;
const UNKNOWN_DISTANCE_CONTRIBUTION = 0.5;

// Size-based fallback: score = (1 - width)^4, lower means closer
const SIZE_SCORE_VERY_CLOSE = 0.1;
const SIZE_SCORE_CLOSE = 0.3;
const SIZE_SCORE_MEDIUM = 0.6;

export interface ScoredGuidance {
  guidance: Guidance;
  detection: Detection;
}

export function isGuidanceCandidate(
  detection: Detection,
  config: LegacyConfig,
  minConfidence: number
): boolean {
  if (detection.confidence < minConfidence) return false;

  // Only the lower half of the frame is the path ahead
  if (detection.yCenter < config.minYCenter) return false;

  if (detection.width < config.minWidth) return false;

  const label = detection.label.toLowerCase().trim();
  return !config.stoplist.some((blocked) => label.includes(blocked));
}

export function directionOf(xCenter: number): Direction {
  if (xCenter < LEFT_BOUNDARY) return 'left';
  if (xCenter > RIGHT_BOUNDARY) return 'right';
  return 'center';
}

export function distanceCategoryFromMeters(meters: number, config: LegacyConfig): DistanceCategory {
  if (meters < config.veryCloseMeters) return 'very_close';
  if (meters < config.closeMeters) return 'close';
  if (meters < config.mediumMeters) return 'medium';
  return 'far';
}

export function distanceCategoryFromWidth(width: number): DistanceCategory {
  const score = Math.pow(1 - width, 4);
  if (score < SIZE_SCORE_VERY_CLOSE) return 'very_close';
  if (score < SIZE_SCORE_CLOSE) return 'close';
  if (score < SIZE_SCORE_MEDIUM) return 'medium';
  return 'far';
}

/**
 * Measured distance wins. Without it, box size is used only when enabled;
 * otherwise the object is treated as far away, which the gate never announces.
 */
export function distanceCategoryOf(detection: Detection, config: LegacyConfig): DistanceCategory {
  if (detection.distanceMeters !== undefined) {
    return distanceCategoryFromMeters(detection.distanceMeters, config);
  }
  if (config.sizeBasedDistance) {
    return distanceCategoryFromWidth(detection.width);
  }
  return 'far';
}

/**
 * priority = confidence*2 + (10 / clamp(distance, 0.1, 10))*3 + direction weight
 */
export function priorityOf(detection: Detection, direction: Direction): number {
  let priority = detection.confidence * CONFIDENCE_WEIGHT;

  if (detection.distanceMeters !== undefined) {
    const capped = Math.max(0.1, Math.min(10, detection.distanceMeters));
    priority += (10 / capped) * DISTANCE_WEIGHT;
  } else {
    priority += UNKNOWN_DISTANCE_CONTRIBUTION * DISTANCE_WEIGHT;
  }

  priority += direction === 'center' ? CENTER_DIRECTION_WEIGHT : SIDE_DIRECTION_WEIGHT;
  return priority;
}

export function toGuidance(detection: Detection, config: LegacyConfig): Guidance {
  const direction = directionOf(detection.xCenter);
  return {
    label: detection.label,
    direction,
    distanceCategory: distanceCategoryOf(detection, config),
    priority: priorityOf(detection, direction),
  };
}

/**
 * Highest-priority guidance for the frame; the first candidate wins ties.
 */
export function selectGuidance(
  detections: Detection[],
  config: LegacyConfig,
  minConfidence: number
): ScoredGuidance | null {
  let best: ScoredGuidance | null = null;

  for (const detection of detections) {
    if (!isGuidanceCandidate(detection, config, minConfidence)) continue;
    const guidance = toGuidance(detection, config);
    if (best === null || guidance.priority > best.guidance.priority) {
      best = { guidance, detection };
    }
  }

  return best;
}
