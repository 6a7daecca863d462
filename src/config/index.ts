import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const API_KEY_ENV = 'OPENWEATHERMAP_API_KEY';

const missingApiKey = `OpenWeatherMap API key not found. Set the ${API_KEY_ENV} environment variable.`;

const configSchema = z.object({
  // OpenWeatherMap
  openWeatherApiKey: z.string({ required_error: missingApiKey }).min(1, missingApiKey),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
});

export type Config = z.infer<typeof configSchema>;

export type Environment = Record<string, string | undefined>;

export function loadConfig(source: Environment = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key]?.trim();
    return value === '' ? undefined : value;
  };

  const raw = {
    openWeatherApiKey: env(API_KEY_ENV),
    logLevel: env('LOG_LEVEL'),
  };

  const result = configSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const missingKey = result.error.issues.find((issue) => issue.path[0] === 'openWeatherApiKey');
  if (missingKey) {
    throw new ConfigurationError(missingKey.message, { cause: result.error });
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, {
    cause: result.error,
  });
}
