/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const chainConfigSchema = z.object({
  order: z.number().int().min(0).default(2),
});

export const backoffConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maximumOrder: z.number().int().min(1).default(3),
  desiredNumNextStates: z.number().int().min(0).default(2),
});

export const randomConfigSchema = z.object({
  kind: z.enum(['pseudo', 'crypto']).default('pseudo'),
  seed: z.number().int().optional(), // ignored by the crypto source
});

export const configSchema = z.object({
  chain: chainConfigSchema.default({}),
  backoff: backoffConfigSchema.default({}),
  random: randomConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ChainConfig = z.infer<typeof chainConfigSchema>;
export type BackoffConfig = z.infer<typeof backoffConfigSchema>;
export type RandomConfig = z.infer<typeof randomConfigSchema>;
