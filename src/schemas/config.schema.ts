import { z } from 'zod';

export const RuntimeConfigSchema = z.object({
  registryPath: z.string().min(1),
  registryState: z.string().min(1),
  appPath: z.string().min(1),
  appArgs: z.array(z.string()),
  windowTitle: z.string().min(1).transform((title) => title.toLowerCase()),
  excludedTitles: z.array(z.string().transform((title) => title.toLowerCase())),
  settleMs: z.coerce.number().int().min(0),
  launchTimeoutMs: z.coerce.number().int().positive(),
  pollIntervalMs: z.coerce.number().int().positive(),
  logDir: z.string().min(1).nullable(),
});

export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
