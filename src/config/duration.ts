// config/duration.ts
import { z } from 'zod';

/** Single-unit human duration → ms. Allowed: "30d", "1h", "45m", "3600s", "1000ms". */
export function parseHumanDurationToMs(input: string): number | null {
  const s = input.trim();
  const unitRe = /^(\d+(?:\.\d+)?)\s*(d|h|m|s|ms)$/i;
  const match = s.match(unitRe);
  if (!match) return null;

  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  switch (unit) {
    case 'd':
      return Math.trunc(value * 24 * 60 * 60 * 1000);
    case 'h':
      return Math.trunc(value * 60 * 60 * 1000);
    case 'm':
      return Math.trunc(value * 60 * 1000);
    case 's':
      return Math.trunc(value * 1000);
    case 'ms':
      return Math.trunc(value);
    default:
      return null;
  }
}

/**
 * String in, number (ms) out. `minMs` defaults to 1ms; "0ms" is allowed only
 * when `minMs` is 0 and means "no expiry" to the cache.
 */
export const durationHumanToMs = (minMs = 1) =>
  z.string().transform((val, ctx) => {
    const ms = parseHumanDurationToMs(val);
    if (ms === null) {
      ctx.addIssue({
        code: 'custom',
        message: 'Invalid duration. Use a single unit like "30d", "1h", "45m", "3600s", or "1000ms".',
      });
      return z.NEVER;
    }
    if (ms < minMs) {
      ctx.addIssue({ code: 'custom', message: `Minimum is ${minMs}ms.` });
      return z.NEVER;
    }
    return ms;
  });
