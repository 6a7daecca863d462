import type { WeatherPort, WeatherReport, UnitSystem } from '../../ports/WeatherPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { DecodeError, HttpError, NetworkError } from '../../utils/errors.js';
import { decodeCurrentWeather } from './openWeatherSchema.js';

export const CURRENT_WEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';

export class OpenWeatherAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherAdapter' });
  private readonly apiKey: string;

  constructor(config: Config) {
    this.apiKey = config.openWeatherApiKey;
  }

  buildUrl(city: string, units: UnitSystem): URL {
    const url = new URL(CURRENT_WEATHER_URL);
    url.searchParams.set('q', city);
    url.searchParams.set('appid', this.apiKey);
    url.searchParams.set('units', units);
    url.searchParams.set('mode', 'json');
    url.searchParams.set('lang', 'en');
    return url;
  }

  async getCurrentWeather(city: string, units: UnitSystem): Promise<WeatherReport> {
    const logger = this.logger.child({ method: 'getCurrentWeather', city, units });
    const url = this.buildUrl(city, units);

    logger.info('Fetching current weather');

    let response: Response;
    let body: string;
    try {
      response = await fetch(url);
      body = await response.text();
    } catch (error) {
      logger.error({ error }, 'OpenWeather request did not complete');
      throw new NetworkError(`Could not reach the weather service: ${describeCause(error)}`, {
        cause: error,
      });
    }

    logger.debug({ status: response.status, body }, 'Received weather response');

    if (!response.ok) {
      logger.error({ status: response.status }, 'OpenWeather API request failed');
      throw new HttpError(city, response.status, providerMessage(body));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new DecodeError(`Weather response is not valid JSON: ${describeCause(error)}`, {
        cause: error,
      });
    }

    const report = decodeCurrentWeather(payload, units);
    logger.info({ temp: report.temperature }, 'Weather data fetched');
    return report;
  }
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Error bodies look like {"cod":"404","message":"city not found"}. */
function providerMessage(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed) {
      const { message } = parsed;
      return typeof message === 'string' && message !== '' ? message : undefined;
    }
  } catch {
    // not JSON; the status alone describes the failure
  }
  return undefined;
}
