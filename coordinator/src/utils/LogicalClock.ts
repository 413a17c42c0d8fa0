import type { LogicalTime } from '../types';

export class LogicalClock {
  private value: LogicalTime;

  constructor(start: LogicalTime = 0) {
    this.value = start;
  }

  tick(): LogicalTime {
    this.value += 1;
    return this.value;
  }

  now(): LogicalTime {
    return this.value;
  }

  /** Never moves backwards. */
  restore(value: LogicalTime): void {
    if (value > this.value) {
      this.value = value;
    }
  }
}
