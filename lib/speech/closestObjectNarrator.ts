import type { Clock, Detection, SpeechRequest } from '@/types/navigation';
import type { ClosestObjectConfig } from '../navigation/config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { closestObjectSpeech } from '../navigation/announcements';
import { zoneOf } from '../navigation/partition';
import type { SpeechArbiter } from './arbiter';

interface NarratorState {
  smoothedDistance: number | null;
  lastSpokenLabel: string | null;
  lastSpokenDistance: number | null;
  lastSpeechAt: number | null;
}

function initialState(): NarratorState {
  return {
    smoothedDistance: null,
    lastSpokenLabel: null,
    lastSpokenDistance: null,
    lastSpeechAt: null,
  };
}

/**
 * Closest confident detection that has a distance. First one wins ties.
 */
export function findClosestWithDistance(
  detections: Detection[],
  minConfidence: number
): (Detection & { distanceMeters: number }) | null {
  let closest: (Detection & { distanceMeters: number }) | null = null;
  for (const detection of detections) {
    const { distanceMeters } = detection;
    if (detection.confidence < minConfidence || distanceMeters === undefined) continue;
    if (closest === null || distanceMeters < closest.distanceMeters) {
      closest = { ...detection, distanceMeters };
    }
  }
  return closest;
}

/**
 * Informational narration of the nearest object ("chair, about 1.4 meters
 * ahead"). Distances are smoothed with an exponential moving average so a
 * jittery depth estimate does not re-trigger speech.
 */
export class ClosestObjectNarrator {
  private state: NarratorState = initialState();

  constructor(
    private readonly arbiter: SpeechArbiter,
    private readonly config: ClosestObjectConfig,
    private readonly clock: Clock,
    private readonly logger: Logger = silentLogger
  ) {}

  process(detections: Detection[]): SpeechRequest | null {
    const closest = findClosestWithDistance(detections, this.config.minConfidence);
    if (!closest) return null;

    const alpha = this.config.smoothingAlpha;
    const previous = this.state.smoothedDistance;
    const smoothed =
      previous === null ? closest.distanceMeters : alpha * closest.distanceMeters + (1 - alpha) * previous;
    this.state.smoothedDistance = smoothed;

    const now = this.clock();
    const { lastSpeechAt, lastSpokenLabel, lastSpokenDistance } = this.state;
    if (lastSpeechAt !== null && now - lastSpeechAt < this.config.cooldownMs) {
      return null;
    }

    const labelChanged = closest.label !== lastSpokenLabel;
    const distanceChanged =
      lastSpokenDistance === null ||
      Math.abs(smoothed - lastSpokenDistance) > this.config.distanceChangeMeters;
    if (!labelChanged && !distanceChanged) return null;

    const text = closestObjectSpeech(closest.label, smoothed, zoneOf(closest.xCenter));
    const request = this.arbiter.request(text, 'information', { source: 'closest_object' });
    if (!request) {
      this.logger.debug(`Closest object suppressed: ${text}`);
      return null;
    }

    this.state.lastSpeechAt = now;
    this.state.lastSpokenLabel = closest.label;
    this.state.lastSpokenDistance = smoothed;
    return request;
  }

  getSmoothedDistance(): number | null {
    return this.state.smoothedDistance;
  }

  reset(): void {
    this.state = initialState();
  }
}
