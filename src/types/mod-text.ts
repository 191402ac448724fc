import { z } from 'zod';

export type ModTextSource = { kind: 'settings'; path: string } | { kind: 'events'; path: string };

// OWML settings values are strings, booleans, numbers or nested option objects.
export const modConfigSchema = z
  .object({
    settings: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const modEventsSchema = z
  .object({
    eventList: z.array(z.object({ Name: z.unknown().optional() }).passthrough()).optional(),
  })
  .passthrough();

export type ModConfig = z.infer<typeof modConfigSchema>;
export type ModEvents = z.infer<typeof modEventsSchema>;
