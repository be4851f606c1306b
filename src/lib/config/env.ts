import * as z from 'zod';

/**
 * Environment variables read by the library.
 *
 * Everything is optional: the library runs with no environment at all and
 * only consults these to decide how chatty its debug logger is. Values are
 * free-form strings so a host application's own conventions never stop the
 * library from loading.
 */
const envSchema = z.object({
  DEBUG: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/** Parses a raw environment record. Unknown keys are dropped. */
export const parseEnv = (raw: NodeJS.ProcessEnv): Env => envSchema.parse(raw);

export const env: Env = parseEnv(process.env);
