import type {
  Detection,
  DistanceCategory,
  Guidance,
  LegacyGateState,
  LegacyVerdict,
} from '@/types/navigation';
import { DISTANCE_CATEGORY_ORDER } from '@/types/navigation';
import type { LegacyConfig } from './config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';

/**
 * Rate limiter for the scoring path, keyed by label and label+direction.
 *
 * Checks run in a fixed order and the first failing one suppresses:
 *   1. global cooldown        5. frame edge
 *   2. far                    6. per-label cooldown
 *   3. medium off center      7. per-label+direction cooldown
 *   4. too small              8. not getting closer
 * An allowed verdict is recorded before evaluate() returns.
 */

export type GuidanceGeometry = Pick<Detection, 'width' | 'xCenter'>;

export function createLegacyGateState(): LegacyGateState {
  return {
    lastGlobalAt: null,
    labelAt: new Map(),
    labelDirectionAt: new Map(),
    labelDistance: new Map(),
  };
}

export function isMoreDangerous(next: DistanceCategory, previous: DistanceCategory): boolean {
  return DISTANCE_CATEGORY_ORDER.indexOf(next) > DISTANCE_CATEGORY_ORDER.indexOf(previous);
}

function directionKey(guidance: Guidance): string {
  return `${guidance.label}-${guidance.direction}`;
}

function coolingDown(last: number | null | undefined, now: number, cooldownMs: number): boolean {
  if (last === null || last === undefined) return false;
  return now - last < cooldownMs;
}

export class LegacyGate {
  private state: LegacyGateState = createLegacyGateState();

  constructor(
    private readonly config: LegacyConfig,
    private readonly logger: Logger = silentLogger
  ) {}

  private check(guidance: Guidance, geometry: GuidanceGeometry, now: number): LegacyVerdict {
    const { config, state } = this;

    if (coolingDown(state.lastGlobalAt, now, config.globalCooldownMs)) {
      return { allowed: false, reason: 'global_cooldown' };
    }

    if (guidance.distanceCategory === 'far') {
      return { allowed: false, reason: 'far' };
    }

    if (guidance.distanceCategory === 'medium') {
      const centerAndImportant =
        guidance.direction === 'center' && guidance.priority > config.mediumPriorityFloor;
      if (!centerAndImportant) return { allowed: false, reason: 'medium_off_center' };
    }

    if (geometry.width < config.minAnnounceWidth) {
      return { allowed: false, reason: 'too_small' };
    }

    if (geometry.xCenter < config.edgeMargin || geometry.xCenter > 1 - config.edgeMargin) {
      return { allowed: false, reason: 'frame_edge' };
    }

    if (coolingDown(state.labelAt.get(guidance.label), now, config.labelCooldownMs)) {
      return { allowed: false, reason: 'label_cooldown' };
    }

    if (coolingDown(state.labelDirectionAt.get(directionKey(guidance)), now, config.directionCooldownMs)) {
      return { allowed: false, reason: 'direction_cooldown' };
    }

    const lastDistance = state.labelDistance.get(guidance.label);
    if (lastDistance !== undefined && !isMoreDangerous(guidance.distanceCategory, lastDistance)) {
      return { allowed: false, reason: 'not_approaching' };
    }

    return { allowed: true };
  }

  evaluate(guidance: Guidance, geometry: GuidanceGeometry, now: number): LegacyVerdict {
    const verdict = this.check(guidance, geometry, now);

    if (!verdict.allowed) {
      this.logger.debug(`SUPPRESSED (${verdict.reason}): ${guidance.label} ${guidance.distanceCategory} ${guidance.direction}`);
      return verdict;
    }

    this.state.lastGlobalAt = now;
    this.state.labelAt.set(guidance.label, now);
    this.state.labelDirectionAt.set(directionKey(guidance), now);
    this.state.labelDistance.set(guidance.label, guidance.distanceCategory);

    this.logger.debug(`ALLOWED: ${guidance.label} ${guidance.distanceCategory} ${guidance.direction}`);
    return verdict;
  }

  remainingLabelCooldown(label: string, now: number): number {
    const last = this.state.labelAt.get(label);
    if (last === undefined) return 0;
    return Math.max(0, this.config.labelCooldownMs - (now - last));
  }

  describeState(now: number): string {
    const { lastGlobalAt, labelAt, labelDistance } = this.state;
    const globalRemaining =
      lastGlobalAt === null ? 0 : Math.max(0, this.config.globalCooldownMs - (now - lastGlobalAt));

    const lines = [
      'Legacy gate state:',
      `  Global cooldown: ${globalRemaining > 0 ? `${globalRemaining}ms` : 'ready'}`,
      `  Tracked objects: ${labelAt.size}`,
    ];
    for (const label of labelAt.keys()) {
      const remaining = this.remainingLabelCooldown(label, now);
      lines.push(`    ${label}: ${remaining > 0 ? `${remaining}ms` : 'ready'} (last ${labelDistance.get(label) ?? 'n/a'})`);
    }
    return lines.join('\n');
  }

  reset(): void {
    this.state = createLegacyGateState();
  }

  snapshot(): LegacyGateState {
    return {
      lastGlobalAt: this.state.lastGlobalAt,
      labelAt: new Map(this.state.labelAt),
      labelDirectionAt: new Map(this.state.labelDirectionAt),
      labelDistance: new Map(this.state.labelDistance),
    };
  }
}
