import type {
  DecisionResult,
  GateVerdict,
  PartitionGateState,
} from '@/types/navigation';
import type { AnnouncementConfig } from './config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { decisionCategory, isUrgent } from './announcements';
import { dominantZone } from './partition';

/**
 * Announcement gate for the partition path.
 *
 * Speaks when the object changes, or when the repeat interval has passed and
 * distance or occupancy moved enough to matter. A minimum gap between any two
 * announcements applies on top of that, to absorb detector flicker.
 *
 * evaluate() and evaluateClear() check and commit in the same call, so a
 * verdict of speak has already been recorded when it is returned.
 */

export function createPartitionGateState(): PartitionGateState {
  return {
    lastSpeechAt: null,
    lastDecisionCategory: null,
    lastSpokenDistance: null,
    lastSpokenOccupancy: null,
    lastSpokenObjectLabel: null,
    lastPathClearAt: null,
  };
}

export class PartitionGate {
  private state: PartitionGateState = createPartitionGateState();

  constructor(
    private readonly config: AnnouncementConfig,
    private readonly logger: Logger = silentLogger
  ) {}

  private sinceLastSpeech(now: number): number {
    return this.state.lastSpeechAt === null ? Infinity : now - this.state.lastSpeechAt;
  }

  evaluate(result: DecisionResult, now: number): GateVerdict {
    const { decision, distanceMeters, occupancy, objectLabel } = result;
    const elapsed = this.sinceLastSpeech(now);
    const category = decisionCategory(decision);

    // Obstacles in view: the next clear frame counts as a fresh transition
    this.state.lastPathClearAt = null;

    if (elapsed < this.config.minInterSpeechMs) {
      this.logger.debug(
        `NavSkip: min interval (${elapsed}ms < ${this.config.minInterSpeechMs}ms) obj=${objectLabel} zone=${dominantZone(result.zoneCoverage)} occ=${occupancy.toFixed(2)}`
      );
      return { speak: false, reason: 'min_interval' };
    }

    const objectChanged = objectLabel !== this.state.lastSpokenObjectLabel;
    const urgent = isUrgent(decision);
    const repeatInterval = urgent ? this.config.urgentRepeatMs : this.config.nonUrgentRepeatMs;
    const timeOk = elapsed >= repeatInterval;

    const distanceDelta =
      this.state.lastSpokenDistance === null
        ? Infinity
        : Math.abs(distanceMeters - this.state.lastSpokenDistance);
    const occupancyDelta =
      this.state.lastSpokenOccupancy === null
        ? Infinity
        : Math.abs(occupancy - this.state.lastSpokenOccupancy);
    const deltaOk =
      distanceDelta >= this.config.distanceDeltaMeters ||
      occupancyDelta >= this.config.occupancyDelta;

    if (!objectChanged && !(timeOk && deltaOk)) {
      this.logger.debug(
        `NavSkip: timeOk=${timeOk} deltaOk=${deltaOk} obj=${objectLabel} cat=${category} since=${elapsed}ms`
      );
      return { speak: false, reason: 'no_change' };
    }

    if (objectChanged) {
      this.logger.debug(
        `Object changed: ${this.state.lastSpokenObjectLabel} -> ${objectLabel} (category ${this.state.lastDecisionCategory} -> ${category})`
      );
    }

    this.state = {
      ...this.state,
      lastSpeechAt: now,
      lastDecisionCategory: category,
      lastSpokenDistance: distanceMeters,
      lastSpokenOccupancy: occupancy,
      lastSpokenObjectLabel: objectLabel,
    };

    const trigger = objectChanged ? 'object_changed' : urgent ? 'urgent_repeat' : 'repeat';
    return { speak: true, trigger };
  }

  /**
   * Path-clear handling: announce once on entering the clear state, then at
   * most once per pathClearRepeatMs while it stays clear.
   */
  evaluateClear(now: number): GateVerdict {
    const elapsed = this.sinceLastSpeech(now);
    if (elapsed < this.config.minInterSpeechMs) {
      this.logger.debug(`Path clear skipped: min interval (${elapsed}ms)`);
      return { speak: false, reason: 'min_interval' };
    }

    const lastClear = this.state.lastPathClearAt;
    const first = lastClear === null;
    if (lastClear !== null && now - lastClear < this.config.pathClearRepeatMs) {
      return { speak: false, reason: 'path_clear_interval' };
    }

    this.state = {
      ...this.state,
      lastSpeechAt: now,
      lastPathClearAt: now,
      lastSpokenObjectLabel: null,
    };
    this.logger.debug(`Path clear announced (first=${first})`);
    return { speak: true, trigger: 'path_clear' };
  }

  reset(): void {
    this.state = createPartitionGateState();
  }

  snapshot(): PartitionGateState {
    return { ...this.state };
  }
}
