/**
 * Schemas entrypoint: zod schemas for the payloads of the default endpoints.
 * Pass them to `getJson` / `post` to get typed results.
 * @module
 */
export { type Client, clientListSchema, clientSchema } from './client.js';
export {
  isRunning,
  type StartTimeEntryRequest,
  startTimeEntryRequestSchema,
  type TimeEntry,
  timeEntryResponseSchema,
  timeEntrySchema,
} from './timeEntry.js';
export { type Workspace, workspaceListSchema, workspaceSchema } from './workspace.js';
