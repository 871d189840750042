import pino, { type Logger } from 'pino';

const defaultLogger = pino();

/**
 * Counts processed items against an optional known total and logs at most
 * once per `minIntervalMs`, plus once on `finish()`.
 */
export class ProgressTracker {
  private readonly startTime = Date.now();
  private lastLogTime = 0;
  private processed = 0;

  constructor(
    private readonly label: string,
    private readonly expectedTotal: number | null = null,
    private readonly logger: Logger = defaultLogger,
    private readonly minIntervalMs = 5000,
  ) {}

  add(count: number): void {
    this.processed += count;
    if (Date.now() - this.lastLogTime >= this.minIntervalMs) this.log();
  }

  get total(): number {
    return this.processed;
  }

  finish(): void {
    this.log();
  }

  private log(): void {
    const now = Date.now();
    const elapsedSec = (now - this.startTime) / 1000;
    const rate = Math.round(this.processed / Math.max(elapsedSec, 0.001));
    const pct =
      this.expectedTotal && this.expectedTotal > 0
        ? ((this.processed / this.expectedTotal) * 100).toFixed(1)
        : null;

    this.logger.info(
      { label: this.label, processed: this.processed, total: this.expectedTotal, pct, rate },
      pct !== null
        ? `${this.label}: ${this.processed.toLocaleString('en-US')} / ${this.expectedTotal?.toLocaleString('en-US')} (${pct}%)`
        : `${this.label}: ${this.processed.toLocaleString('en-US')} processed`,
    );
    this.lastLogTime = now;
  }
}
