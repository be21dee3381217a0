import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { serializationMode } from '../schemas/tree-record.js';

// Environment values arrive as strings; "false" must not coerce to true.
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Centralised configuration schema for Canopy.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Record layout used by codecs that do not pick one explicitly
  TREE_SERIALIZATION_MODE: serializationMode.default('full'),

  // Whether tree outlines show "id: value" or the value alone
  TREE_PRINT_NODE_IDS: booleanFlag.default(true),

  // Backend behind the default identifier generator
  ID_GENERATOR: z.enum(['epoch', 'sequential']).default('epoch'),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
});
