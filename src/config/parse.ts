/**
 * Validation of configuration objects handed in by the caller
 */

import { configSchema, type Config } from './schema.js';

/**
 * Validate a plain object (for example parsed JSON) and fill in defaults.
 * Throws one Error listing every failing field.
 */
export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(input ?? {});

  if (!result.success) {
    const errors = result.error.errors
      .map(e => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  const config = result.data;
  if (config.random.kind === 'crypto' && config.random.seed !== undefined) {
    console.warn(`Ignoring random.seed ${config.random.seed}: the crypto source cannot be seeded`);
  }
  if (!config.backoff.enabled && isBackoffCustomized(input)) {
    console.warn('backoff settings have no effect while backoff.enabled is false');
  }

  return config;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

function isBackoffCustomized(input: unknown): boolean {
  if (typeof input !== 'object' || input === null || !('backoff' in input)) {
    return false;
  }
  const backoff = input.backoff;
  return (
    typeof backoff === 'object' &&
    backoff !== null &&
    ('maximumOrder' in backoff || 'desiredNumNextStates' in backoff)
  );
}
