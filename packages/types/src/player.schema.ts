/**
 * Player session schemas for the HTTP host
 */

import { z } from 'zod';

export const BackendServerSchema = z.object({
  name: z.string().trim().min(1).max(64),
  url: z.string().url(),
});

export type BackendServer = z.infer<typeof BackendServerSchema>;

export const PlayerSessionSchema = z.object({
  name: z.string().trim().min(1, 'Player name is required').max(64),
  permissions: z.array(z.string().min(1)).default([]),
  /** Backend server the player is currently connected to */
  server: BackendServerSchema.nullable().default(null),
});

export type PlayerSessionInput = z.input<typeof PlayerSessionSchema>;
export type PlayerSession = z.infer<typeof PlayerSessionSchema>;
