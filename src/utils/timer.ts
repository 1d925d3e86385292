/**
 * timer.ts
 * High-precision timer for stage durations
 */

export class Timer {
  private startTime: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Get total elapsed time in milliseconds
   */
  elapsed(): number {
    return Math.round(performance.now() - this.startTime);
  }

  /**
   * Get total elapsed time in seconds, unrounded
   */
  elapsedSeconds(): number {
    return (performance.now() - this.startTime) / 1000;
  }
}
