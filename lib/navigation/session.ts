import type {
  Clock,
  Detection,
  Frame,
  FrameOutcome,
  SpeechSink,
  StrategyName,
} from '@/types/navigation';
import type { GuidanceConfig } from './config';
import { DEFAULT_GUIDANCE_CONFIG } from './config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { systemClock } from '../clock';
import { attachDepth, normalizeDetections } from './normalizer';
import type { DecisionStrategy } from './strategies';
import { createStrategy } from './strategies';
import { SpeechArbiter } from '../speech/arbiter';
import { ClosestObjectNarrator } from '../speech/closestObjectNarrator';
import type { SceneDescriber, SceneImage, SceneNarration } from '../speech/sceneNarrator';
import { SceneNarrator } from '../speech/sceneNarrator';

export interface GuidanceSessionOptions {
  sink: SpeechSink;
  config?: GuidanceConfig;
  strategy?: StrategyName;
  clock?: Clock;
  logger?: Logger;
  sceneDescriber?: SceneDescriber | null;
}

/**
 * Guidance Session
 *
 * Owns everything one user's walk needs: the active strategy and its gate,
 * the speech arbiter and the two narrators. Frames go in one at a time;
 * nothing here awaits the speech sink.
 */
export class GuidanceSession {
  readonly arbiter: SpeechArbiter;
  private strategy: DecisionStrategy;
  private readonly closestObject: ClosestObjectNarrator;
  private readonly scene: SceneNarrator;
  private readonly config: GuidanceConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private lastDetections: Detection[] = [];
  private paused = false;

  constructor(options: GuidanceSessionOptions) {
    this.config = options.config ?? DEFAULT_GUIDANCE_CONFIG;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;

    this.arbiter = new SpeechArbiter(options.sink, {
      suppressionWindowMs: this.config.speech.suppressionWindowMs,
      clock: this.clock,
      logger: this.logger,
    });
    this.strategy = createStrategy(options.strategy ?? 'partition', this.config, this.logger);
    this.closestObject = new ClosestObjectNarrator(
      this.arbiter,
      this.config.closestObject,
      this.clock,
      this.logger
    );
    this.scene = new SceneNarrator(
      options.sceneDescriber ?? null,
      this.arbiter,
      this.config.scene,
      this.clock,
      this.logger
    );
  }

  processFrame(frame: Frame): FrameOutcome {
    let detections = normalizeDetections(frame.detections);
    if (frame.depthMap) {
      detections = attachDepth(detections, frame.depthMap, this.config.depth);
    }
    this.lastDetections = [...detections];

    const outcome: FrameOutcome = {
      strategy: this.strategy.name,
      detections,
      announcement: null,
      narration: null,
    };
    if (this.paused) return outcome;

    const now = this.clock();
    const intent = this.strategy.evaluate(detections, frame.frameWidth ?? 1, now);
    if (intent) {
      outcome.announcement = this.arbiter.request(intent.text, intent.priority, {
        interrupt: intent.interrupt,
        source: intent.source,
      });
    }

    if (this.config.closestObject.enabled) {
      outcome.narration = this.closestObject.process(detections);
    }

    return outcome;
  }

  /**
   * Describe the surroundings on demand, using the latest frame's detections
   * when none are given.
   */
  describeScene(image: SceneImage | null, detections: Detection[] = this.lastDetections): Promise<SceneNarration | null> {
    return this.scene.narrate(image, detections);
  }

  getStrategy(): StrategyName {
    return this.strategy.name;
  }

  /**
   * Switching starts the new strategy with a fresh gate.
   */
  setStrategy(name: StrategyName): void {
    if (name === this.strategy.name) return;
    this.logger.info(`Switching strategy: ${this.strategy.name} -> ${name}`);
    this.strategy = createStrategy(name, this.config, this.logger);
  }

  isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.paused = true;
    this.scene.cancelPending();
    this.logger.debug('Session paused');
  }

  resume(): void {
    this.reset();
    this.paused = false;
    this.logger.debug('Session resumed');
  }

  reset(): void {
    this.strategy.reset();
    this.arbiter.reset();
    this.closestObject.reset();
    this.scene.reset();
    this.lastDetections = [];
  }
}
