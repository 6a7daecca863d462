import type { WeatherReport } from '../ports/WeatherPort.js';

export function currentWeatherPayload(): Record<string, unknown> {
  return {
    coord: { lon: 24.02, lat: 49.84 },
    weather: [{ id: 800, main: 'Clear', description: 'clear sky', icon: '01d' }],
    base: 'stations',
    main: { temp: 21.5, feels_like: 20, temp_min: 19.8, temp_max: 22.1, pressure: 1015, humidity: 40 },
    visibility: 10000,
    wind: { speed: 3.2, deg: 200 },
    clouds: { all: 0 },
    dt: 1718445600,
    sys: { country: 'UA', sunrise: 1718417400, sunset: 1718477400 },
    timezone: 10800,
    id: 702550,
    name: 'Lviv',
    cod: 200,
  };
}

export function sampleReport(overrides: Partial<WeatherReport> = {}): WeatherReport {
  return {
    city: 'Lviv',
    country: 'UA',
    units: 'metric',
    temperature: 21.5,
    feelsLike: 20,
    humidity: 40,
    pressure: 1015,
    windSpeed: 3.2,
    sunrise: 1718417400,
    sunset: 1718477400,
    timezoneOffset: 10800,
    condition: { code: 800, description: 'clear sky' },
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
