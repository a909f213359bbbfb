// config/duration.ts
import { z } from 'zod';

const SECONDS_PER_UNIT: Record<string, number> = {
  d: 24 * 60 * 60,
  h: 60 * 60,
  m: 60,
  s: 1,
};

/** Single-unit human duration → seconds. Allowed: "2.5d", "1h", "45m", "3600s". */
export function parseHumanDuration(input: string): number | null {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(d|h|m|s)$/i);
  if (!match) return null;
  const perUnit = SECONDS_PER_UNIT[match[2].toLowerCase()];
  if (perUnit === undefined) return null;
  return Math.trunc(parseFloat(match[1]) * perUnit);
}

/**
 * Duration in seconds, given either as a number of seconds or a human string.
 */
export const durationSeconds = (minSeconds = 0) =>
  z
    .union([
      z.number().int().nonnegative(),
      z.string().transform((val, ctx) => {
        const seconds = parseHumanDuration(val);
        if (seconds === null) {
          ctx.addIssue({
            code: 'custom',
            message: 'Invalid duration. Use a single unit like "2.5d", "1h", "45m" or "3600s".',
          });
          return z.NEVER;
        }
        return seconds;
      }),
    ])
    .refine((seconds) => seconds >= minSeconds, { message: `Minimum is ${minSeconds}s.` });
