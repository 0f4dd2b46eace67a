/**
 * Environment schema for the API process.
 *
 * Parsed once at startup; a bad or missing variable stops the process before
 * it opens a port.
 */
import { z } from 'zod'

/**
 * Transform string to number with default
 * NOTE: .default() must come before .transform() since it operates on the input type
 */
const numberString = (defaultValue: number) =>
  z
    .string()
    .default(String(defaultValue))
    .transform((v) => parseInt(v, 10))
    .pipe(z.number().int().positive())

export const apiEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  PORT: numberString(6129),
  /** Comma-separated origins; `*` allows any. */
  CORS_ORIGIN: z.string().default('*'),
})

export type ApiConfig = z.infer<typeof apiEnvSchema>

export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const parsed = apiEnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid environment: ${issues}`)
  }
  return parsed.data
}

export function corsOrigins(config: Pick<ApiConfig, 'CORS_ORIGIN'>): string | string[] {
  const origins = config.CORS_ORIGIN.split(',').map((origin) => origin.trim()).filter(Boolean)
  if (origins.length === 0 || origins.includes('*')) return '*'
  return origins
}
