import { systemClock, type Clock } from './clock.js';

/** Milliseconds since construction, read from the pipeline clock. */
export class StepTimer {
  private readonly startedAt: number;

  constructor(private readonly clock: Clock = systemClock) {
    this.startedAt = clock.now();
  }

  elapsed(): number {
    return this.clock.now() - this.startedAt;
  }
}
