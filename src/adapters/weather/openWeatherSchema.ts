import { z } from 'zod';
import type { UnitSystem, WeatherReport } from '../../ports/WeatherPort.js';
import { DecodeError } from '../../utils/errors.js';

const conditionSchema = z.object({
  id: z.number().int().optional(),
  main: z.string().optional(),
  description: z.string(),
  icon: z.string().optional(),
});

// Only the subset of the current-weather payload that the report shows.
const currentWeatherSchema = z.object({
  name: z.string(),
  timezone: z.number().int().optional(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number().int().min(0).max(100),
    pressure: z.number(),
  }),
  wind: z.object({
    speed: z.number().min(0),
  }),
  sys: z.object({
    country: z.string().optional(),
    sunrise: z.number().int(),
    sunset: z.number().int(),
  }),
  weather: z.array(conditionSchema),
});

export function decodeCurrentWeather(payload: unknown, units: UnitSystem): WeatherReport {
  const result = currentWeatherSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DecodeError(`Unexpected weather response: ${issues.join('; ')}`, { cause: result.error });
  }

  const data = result.data;
  const condition = data.weather[0];

  return {
    city: data.name,
    country: data.sys.country ?? '',
    units,
    temperature: data.main.temp,
    feelsLike: data.main.feels_like,
    humidity: data.main.humidity,
    pressure: Math.round(data.main.pressure),
    windSpeed: data.wind.speed,
    sunrise: data.sys.sunrise,
    sunset: data.sys.sunset,
    timezoneOffset: data.timezone ?? 0,
    condition: condition
      ? { code: condition.id ?? null, description: condition.description }
      : { code: null, description: 'Unknown' },
  };
}
