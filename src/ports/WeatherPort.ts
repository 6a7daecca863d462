export type UnitSystem = 'metric' | 'imperial';

export interface WeatherCondition {
  /** Provider condition code, e.g. 800 for clear sky. */
  code: number | null;
  description: string;
}

export interface WeatherReport {
  city: string;
  country: string;
  units: UnitSystem;
  temperature: number;
  feelsLike: number;
  humidity: number;
  pressure: number;
  windSpeed: number;
  /** Unix seconds */
  sunrise: number;
  /** Unix seconds */
  sunset: number;
  /** Seconds east of UTC for the city */
  timezoneOffset: number;
  condition: WeatherCondition;
}

export interface WeatherPort {
  getCurrentWeather(city: string, units: UnitSystem): Promise<WeatherReport>;
}
