import type { SpeechRequest, SpeechSink } from '@/types/navigation';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { comparePriority } from './arbiter';

/**
 * Anything that can say one line of text at a time.
 * say() resolves when playback ends; stop() must make a pending say() resolve.
 */
export interface Utterer {
  say(text: string): Promise<void>;
  stop(): void;
}

interface QueueItem {
  request: SpeechRequest;
  done: () => void;
}

/**
 * Priority queue for speech output
 * Manages interrupts and queued messages on a single utterer
 */
export class SpeechQueue implements SpeechSink {
  private queue: QueueItem[] = [];
  private currentItem: QueueItem | null = null;
  private isProcessing: boolean = false;

  constructor(
    private readonly utterer: Utterer,
    private readonly onSpeakingChange?: (speaking: boolean, text?: string) => void,
    private readonly logger: Logger = createLogger('SpeechQueue')
  ) {}

  speak(request: SpeechRequest): Promise<void> {
    return new Promise<void>((resolve) => {
      this.add({ request, done: resolve });
    });
  }

  private add(item: QueueItem): void {
    // Interrupt: drop everything waiting and cut off whatever is playing
    if (item.request.interrupt) {
      for (const dropped of this.queue) dropped.done();
      this.queue = [item];
      if (this.currentItem) this.utterer.stop();
      void this.processQueue();
      return;
    }

    // Insert after every item of equal or higher priority
    const insertAt = this.queue.findIndex(
      (queued) => comparePriority(queued.request.priority, item.request.priority) > 0
    );
    if (insertAt === -1) {
      this.queue.push(item);
    } else {
      this.queue.splice(insertAt, 0, item);
    }

    void this.processQueue();
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessing) {
      return;
    }

    this.isProcessing = true;

    let item = this.queue.shift();
    while (item) {
      this.currentItem = item;

      try {
        this.onSpeakingChange?.(true, item.request.text);
        await this.utterer.say(item.request.text);
      } catch (error) {
        this.logger.error('Error processing speech queue:', error);
      }

      this.onSpeakingChange?.(false);
      this.currentItem = null;
      item.done();
      item = this.queue.shift();
    }

    this.isProcessing = false;
  }

  /**
   * Clear the queue and stop playback
   */
  clear(): void {
    for (const dropped of this.queue) dropped.done();
    this.queue = [];
    if (this.currentItem) this.utterer.stop();
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  isSpeaking(): boolean {
    return this.currentItem !== null;
  }
}

/**
 * Utterer that prints instead of playing audio, for local runs.
 */
export function createConsoleUtterer(write: (line: string) => void = console.log): Utterer {
  return {
    async say(text: string) {
      write(`🔊 ${text}`);
    },
    stop() {},
  };
}
