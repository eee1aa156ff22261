/**
 * Option schemas for views.
 *
 * Only the serializable settings are described here; callbacks such as
 * equality functions and logger instances are resolved by the view layer.
 *
 * @module config/options
 */
import { z } from 'zod';
import { ConfigError } from '../errors/seq-error.js';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** Settings accepted by every view constructor */
export const viewSettingsSchema = z.object({
  /** Name used in logs and error context */
  name: z.string().min(1).optional(),
  /** Check that remove/update deltas carry the element they replace */
  validate: z.boolean().default(true),
  /** Minimum level for the view's logger */
  logLevel: logLevelSchema.optional(),
});

export type ViewSettingsInput = z.input<typeof viewSettingsSchema>;
export type ViewSettings = z.output<typeof viewSettingsSchema>;

/** Bounds of a slice; `until` may be `Infinity` for an open-ended window */
export const sliceBoundsSchema = z.object({
  from: z.number().int(),
  until: z.union([z.number().int(), z.literal(Infinity)]),
});

export type SliceBounds = z.output<typeof sliceBoundsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate view settings, applying defaults.
 *
 * @throws ConfigError when a setting has the wrong type
 */
export function parseViewSettings(input: unknown): ViewSettings {
  const result = viewSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate and clamp slice bounds: `from` is at least 0 and `until` at least `from`.
 */
export function parseSliceBounds(from: number, until: number): SliceBounds {
  const result = sliceBoundsSchema.safeParse({ from, until });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), { from, until });
  }
  const lo = Math.max(0, result.data.from);
  return { from: lo, until: Math.max(lo, result.data.until) };
}
