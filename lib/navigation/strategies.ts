import type {
  AnnouncementSource,
  Detection,
  SpeechPriority,
  StrategyName,
} from '@/types/navigation';
import type { GuidanceConfig } from './config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { selectNavigable, decide } from './decision';
import { analyzePartitions } from './partition';
import { PartitionGate } from './partitionGate';
import { LegacyGate } from './legacyGate';
import { selectGuidance } from './scoring';
import { PATH_CLEAR_SPEECH, decisionSpeech, guidanceSpeech, isUrgent } from './announcements';

/**
 * What a strategy wants said for a frame. The arbiter turns it into a request.
 */
export interface AnnouncementIntent {
  text: string;
  priority: SpeechPriority;
  interrupt: boolean;
  source: AnnouncementSource;
}

export interface DecisionStrategy {
  readonly name: StrategyName;
  evaluate(detections: Detection[], frameWidth: number, now: number): AnnouncementIntent | null;
  reset(): void;
}

/**
 * Partition path: filter, analyze zones, decide, then gate.
 * An empty navigable set is a path-clear frame.
 */
export class PartitionStrategy implements DecisionStrategy {
  readonly name = 'partition' as const;
  private readonly gate: PartitionGate;

  constructor(
    private readonly config: GuidanceConfig,
    private readonly logger: Logger = silentLogger
  ) {
    this.gate = new PartitionGate(config.announcement, logger);
  }

  evaluate(detections: Detection[], frameWidth: number, now: number): AnnouncementIntent | null {
    const navigable = selectNavigable(detections, this.config.filter);

    if (navigable.length === 0) {
      const verdict = this.gate.evaluateClear(now);
      if (!verdict.speak) return null;
      return { text: PATH_CLEAR_SPEECH, priority: 'navigation', interrupt: false, source: 'path_clear' };
    }

    const analyses = navigable.map((detection) => analyzePartitions(detection, frameWidth));
    const result = decide(analyses, this.config.partition);
    if (!result) return null;

    const verdict = this.gate.evaluate(result, now);
    if (!verdict.speak) return null;

    const urgent = isUrgent(result.decision);
    this.logger.debug(
      `Decision ${result.decision} (${verdict.trigger}) obj=${result.objectLabel} dist=${result.distanceMeters.toFixed(2)}m occ=${result.occupancy.toFixed(2)}`
    );
    return {
      text: decisionSpeech(result.decision, result.objectLabel),
      priority: urgent ? 'urgent' : 'navigation',
      interrupt: urgent,
      source: 'navigation',
    };
  }

  getGate(): PartitionGate {
    return this.gate;
  }

  reset(): void {
    this.gate.reset();
  }
}

/**
 * Scoring path: pick the single highest-priority object, then gate by
 * label and direction cooldowns.
 */
export class LegacyStrategy implements DecisionStrategy {
  readonly name = 'legacy' as const;
  private readonly gate: LegacyGate;

  constructor(
    private readonly config: GuidanceConfig,
    private readonly logger: Logger = silentLogger
  ) {
    this.gate = new LegacyGate(config.legacy, logger);
  }

  evaluate(detections: Detection[], _frameWidth: number, now: number): AnnouncementIntent | null {
    const scored = selectGuidance(detections, this.config.legacy, this.config.filter.minConfidence);
    if (!scored) return null;

    const verdict = this.gate.evaluate(scored.guidance, scored.detection, now);
    if (!verdict.allowed) return null;

    const veryClose = scored.guidance.distanceCategory === 'very_close';
    return {
      text: guidanceSpeech(scored.guidance),
      priority: veryClose ? 'urgent' : 'navigation',
      interrupt: veryClose,
      source: 'legacy',
    };
  }

  getGate(): LegacyGate {
    return this.gate;
  }

  reset(): void {
    this.gate.reset();
  }
}

export function createStrategy(
  name: StrategyName,
  config: GuidanceConfig,
  logger: Logger = silentLogger
): DecisionStrategy {
  switch (name) {
    case 'partition':
      return new PartitionStrategy(config, logger);
    case 'legacy':
      return new LegacyStrategy(config, logger);
  }
}
