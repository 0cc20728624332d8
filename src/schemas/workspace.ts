import { z } from 'zod';

/** Workspace as listed by the `workspaces` endpoint. */
export const workspaceSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  premium: z.boolean().default(false),
  admin: z.boolean().default(false),
  default_hourly_rate: z.number().optional(),
  default_currency: z.string().optional(),
  rounding: z.number().int().optional(),
  rounding_minutes: z.number().int().optional(),
  at: z.string().optional(),
});

export type Workspace = z.infer<typeof workspaceSchema>;

/** Body of the `workspaces` endpoint. */
export const workspaceListSchema = z.array(workspaceSchema);
