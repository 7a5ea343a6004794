/**
 * Output path naming for capture sessions: `<baseDir>/Bag_YYYY_MM_DD_HH_MM_SS` (UTC).
 */

import { BAG_DIRECTORY_PREFIX } from '../constants.js';

export type Clock = () => Date;

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** Format a timestamp as `YYYY_MM_DD_HH_MM_SS` in UTC. */
export function formatUtcStamp(date: Date): string {
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join('_');
}

export function derivePath(baseDir: string, now: Date): string {
  const base = baseDir.replace(/\/+$/, '');
  return `${base}/${BAG_DIRECTORY_PREFIX}${formatUtcStamp(now)}`;
}

/**
 * Hands out one output path per session.
 *
 * The clock is clamped so it never runs backwards, and a session that starts
 * in the same second as the previous one gets a `_1`, `_2`, ... suffix rather
 * than reusing (and overwriting) the earlier directory.
 */
export class PathNamer {
  private lastMs = Number.NEGATIVE_INFINITY;
  private lastBase: string | null = null;
  private collisions = 0;

  constructor(
    private readonly baseDir: string,
    private readonly clock: Clock = () => new Date()
  ) {}

  next(): string {
    const nowMs = Math.max(this.clock().getTime(), this.lastMs);
    this.lastMs = nowMs;

    const base = derivePath(this.baseDir, new Date(nowMs));
    if (base === this.lastBase) {
      this.collisions++;
      return `${base}_${this.collisions}`;
    }

    this.lastBase = base;
    this.collisions = 0;
    return base;
  }
}
