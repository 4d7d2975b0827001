import { z } from 'zod/v4';

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  JWT_SECRET: z.string().min(1),
  PORT: z.coerce.number().default(3000),
  UPLOAD_DIR: z.string().default('./data/uploads'),
  // Prefix for file URLs handed to clients; relative URLs when unset
  PUBLIC_URL: z.string().url().optional(),
  MAX_UPLOAD_SIZE_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  AGENT_RUNNER_URL: z.string().url().optional(),
  AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  PUSH_GATEWAY_URL: z.string().url().optional(),
  PUSH_GATEWAY_KEY: z.string().optional(),
  HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),
  SEED_BOTS: z
    .string()
    .default('true')
    .transform((v) => v !== 'false'),
});

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: Record<string, string | undefined>): Config {
  return envSchema.parse(env);
}

export const config = parseConfig(process.env);
