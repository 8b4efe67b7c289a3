import { v4 as uuidv4 } from 'uuid';
import type {
  AnnouncementSource,
  Clock,
  SpeechPriority,
  SpeechRequest,
  SpeechSink,
} from '@/types/navigation';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { systemClock } from '../clock';

/**
 * Speech Arbiter
 *
 * Single gateway to the audio output for every producer (navigation, path
 * clear, closest-object narration, scene description). It never decides what
 * to say, only whether a request goes out, whether it flushes what is queued,
 * and when informational chatter has to stay quiet.
 *
 * Tiers, most important first: urgent > navigation > information.
 */

const PRIORITY_RANK: Record<SpeechPriority, number> = {
  urgent: 0,
  navigation: 1,
  information: 2,
};

export function comparePriority(a: SpeechPriority, b: SpeechPriority): number {
  return PRIORITY_RANK[a] - PRIORITY_RANK[b];
}

export interface SpeechArbiterOptions {
  suppressionWindowMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RequestOptions {
  source: AnnouncementSource;
  interrupt?: boolean;
}

export class SpeechArbiter {
  private suppressedUntil: number | null = null;
  private pending: SpeechRequest[] = [];
  private generation = 0;
  private readonly suppressionWindowMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly sink: SpeechSink,
    options: SpeechArbiterOptions
  ) {
    this.suppressionWindowMs = options.suppressionWindowMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Hand a message to the sink. Returns the request that was sent, or null when
   * it was dropped by an active suppression window.
   *
   * An interrupt only preempts its own tier or a lower one. Asked for while a
   * more urgent request is still in flight, it is queued behind it instead and
   * the returned request carries `interrupt: false`.
   */
  request(text: string, priority: SpeechPriority, options: RequestOptions): SpeechRequest | null {
    const now = this.clock();

    if (this.isSuppressed(priority)) {
      this.logger.debug(`Dropped ${options.source} (${priority}): "${text}" suppressed until ${this.suppressedUntil}`);
      return null;
    }

    let interrupt = options.interrupt ?? false;
    const inFlight = this.currentPriority();
    if (interrupt && inFlight !== null && comparePriority(priority, inFlight) > 0) {
      // A lower tier may queue behind a higher one but never cut it off
      this.logger.debug(`Interrupt downgraded: ${priority} cannot preempt ${inFlight}`);
      interrupt = false;
    }

    const request: SpeechRequest = {
      id: uuidv4(),
      text,
      priority,
      interrupt,
      source: options.source,
      requestedAt: now,
    };

    if (interrupt) {
      // The sink flushes everything queued before this request
      this.pending = [];
    }
    this.pending.push(request);

    if (priority !== 'information') {
      this.suppressInformation(this.suppressionWindowMs);
    }

    this.dispatch(request);
    this.logger.debug(`SPEAKING: "${text}" [priority=${priority}, interrupt=${interrupt}, source=${options.source}]`);
    return request;
  }

  private dispatch(request: SpeechRequest): void {
    const generation = this.generation;
    const settle = () => this.settle(request, generation);

    let spoken: Promise<void>;
    try {
      spoken = this.sink.speak(request);
    } catch (error) {
      this.logger.error('Speech sink failed:', error);
      settle();
      return;
    }

    void spoken
      .catch((error: unknown) => {
        this.logger.error('Speech sink failed:', error);
      })
      .finally(settle);
  }

  private settle(request: SpeechRequest, generation: number): void {
    if (generation !== this.generation) return;
    this.pending = this.pending.filter((p) => p.id !== request.id);
  }

  /**
   * Only informational speech can be suppressed.
   */
  isSuppressed(priority: SpeechPriority): boolean {
    if (priority !== 'information' || this.suppressedUntil === null) return false;
    return this.clock() < this.suppressedUntil;
  }

  suppressInformation(durationMs: number): void {
    const until = this.clock() + durationMs;
    if (this.suppressedUntil === null || until > this.suppressedUntil) {
      this.suppressedUntil = until;
    }
  }

  getSuppressedUntil(): number | null {
    return this.suppressedUntil;
  }

  /**
   * Most important tier still waiting on the sink, or null when idle.
   */
  currentPriority(): SpeechPriority | null {
    let best: SpeechPriority | null = null;
    for (const request of this.pending) {
      if (best === null || comparePriority(request.priority, best) < 0) best = request.priority;
    }
    return best;
  }

  reset(): void {
    this.suppressedUntil = null;
    this.pending = [];
    this.generation++;
    this.logger.debug('Arbiter reset');
  }
}
