import type { Clock } from '@/types/navigation';

export const systemClock: Clock = () => Date.now();

/**
 * Hand-driven clock for deterministic gate and arbiter runs.
 */
export class ManualClock {
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  readonly now: Clock = () => this.current;

  set(time: number): void {
    this.current = time;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
