import { z } from 'zod';

/** Client (the customer a workspace bills) as listed by the `clients` endpoint. */
export const clientSchema = z.object({
  id: z.number().int(),
  wid: z.number().int(),
  name: z.string(),
  notes: z.string().optional(),
  at: z.string().optional(),
});

export type Client = z.infer<typeof clientSchema>;

/** Body of the `clients` endpoint. The service answers `null` when there are none. */
export const clientListSchema = z
  .array(clientSchema)
  .nullable()
  .transform((clients) => clients ?? []);
