import { z } from 'zod';
import { parseLocalDateTime } from '../../common/utils/local-time';

/** ISO-8601 date or date-time; naive local time when it carries no offset */
const isoDate = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const parsed = parseLocalDateTime(value);
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

export const RunOptionsSchema = z
  .object({
    batchSize: z.number().int().positive(),
    maxAttempts: z.number().int().positive(),
    backoffBaseMs: z.number().int().nonnegative(),
    backoffMaxMs: z.number().int().nonnegative(),
    continueOnBatchFailure: z.boolean(),
    timeoutMs: z.number().int().positive(),
    aggregate: z.boolean(),
    sensorId: z.string().min(1).max(64),
  })
  .partial()
  .strict();

/**
 * Body of POST /pipeline/runs.
 * `wait` (default true) returns the terminal run; false returns at once
 * with the Running snapshot.
 */
export const RunRequestSchema = z.object({
  windowStart: isoDate,
  windowEnd: isoDate,
  options: RunOptionsSchema.optional(),
  wait: z.boolean().default(true),
});

export type RunRequestDto = z.infer<typeof RunRequestSchema>;

/** Body of POST /pipeline/aggregate */
export const AggregateRequestSchema = z.object({
  windowStart: isoDate,
  windowEnd: isoDate,
  sensorId: z.string().min(1).max(64).optional(),
});

export type AggregateRequestDto = z.infer<typeof AggregateRequestSchema>;

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
