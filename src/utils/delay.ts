/**
 * Human-paced delays between fetches
 */

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

/**
 * Pick a delay uniformly within the range
 */
export function jitter(range: DelayRange, random: () => number = Math.random): number {
  const span = Math.max(0, range.maxMs - range.minMs);
  return Math.round(range.minMs + random() * span);
}

export interface PacerOptions {
  page: DelayRange;
  article: DelayRange;
  sleep?: Sleep;
  random?: () => number;
}

export type PauseKind = 'page' | 'article';

/**
 * Applies a jittered pause before each page or article fetch.
 * Pauses are mandatory pacing, not backoff: they do not depend on the
 * outcome of the previous fetch.
 */
export class Pacer {
  private readonly ranges: Record<PauseKind, DelayRange>;
  private readonly sleepFn: Sleep;
  private readonly random: () => number;
  private total = 0;

  constructor(options: PacerOptions) {
    this.ranges = { page: options.page, article: options.article };
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  async pause(kind: PauseKind): Promise<number> {
    const delay = jitter(this.ranges[kind], this.random);
    this.total += delay;
    await this.sleepFn(delay);
    return delay;
  }

  /** Sum of all delays applied so far */
  get totalDelayMs(): number {
    return this.total;
  }
}
