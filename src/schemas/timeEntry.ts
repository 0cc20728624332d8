import { z } from 'zod';

/**
 * A time entry. `duration` is in seconds; while the entry is running it holds
 * the negated start time as a unix timestamp.
 */
export const timeEntrySchema = z.object({
  id: z.number().int(),
  wid: z.number().int(),
  pid: z.number().int().optional(),
  billable: z.boolean().default(false),
  start: z.string(),
  stop: z.string().optional(),
  duration: z.number().int(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  at: z.string().optional(),
});

export type TimeEntry = z.infer<typeof timeEntrySchema>;

/** Body of the `start-time-entry` endpoint. */
export const timeEntryResponseSchema = z.object({
  data: timeEntrySchema,
});

/** Request body for the `start-time-entry` endpoint. */
export const startTimeEntryRequestSchema = z.object({
  time_entry: z.object({
    description: z.string(),
    pid: z.number().int().optional(),
    tags: z.array(z.string()).optional(),
    created_with: z.string().min(1),
  }),
});

export type StartTimeEntryRequest = z.infer<typeof startTimeEntryRequestSchema>;

/** Whether the entry is still running. */
export function isRunning(entry: Pick<TimeEntry, 'duration'>): boolean {
  return entry.duration < 0;
}
