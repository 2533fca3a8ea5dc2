import type { Clock } from "../core/clock";

/**
 * An ability timer. Ready until triggered, then again once `duration`
 * seconds of clock time have passed.
 */
export class Cooldown {
  private startedAt: number | undefined;

  constructor(
    private durationSeconds: number,
    private readonly clock: Clock,
  ) {}

  get duration(): number {
    return this.durationSeconds;
  }

  /** Clock time of the last trigger, undefined if never triggered or reset */
  get lastTriggered(): number | undefined {
    return this.startedAt;
  }

  private elapsed(): number {
    return this.startedAt === undefined ? Number.POSITIVE_INFINITY : this.clock.now() - this.startedAt;
  }

  isReady(): boolean {
    return this.startedAt === undefined || this.elapsed() >= this.durationSeconds;
  }

  remaining(): number {
    if (this.startedAt === undefined) return 0;
    return Math.max(0, this.durationSeconds - this.elapsed());
  }

  /** 1 when never triggered; otherwise elapsed / duration, clamped to 1 */
  progress(): number {
    if (this.startedAt === undefined || this.durationSeconds <= 0) return 1;
    return Math.min(1, this.elapsed() / this.durationSeconds);
  }

  trigger(): void {
    this.startedAt = this.clock.now();
  }

  reset(): void {
    this.startedAt = undefined;
  }

  setDuration(durationSeconds: number): void {
    this.durationSeconds = Math.max(0, durationSeconds);
  }
}
