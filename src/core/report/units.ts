import type { UnitSystem } from '../../ports/WeatherPort.js';

export function celsiusToFahrenheit(celsius: number): number {
  return (celsius * 9) / 5 + 32;
}

export function fahrenheitToCelsius(fahrenheit: number): number {
  return ((fahrenheit - 32) * 5) / 9;
}

/** Returns the temperature as [celsius, fahrenheit], whatever system it was reported in. */
export function bothScales(value: number, units: UnitSystem): [number, number] {
  return units === 'metric'
    ? [value, celsiusToFahrenheit(value)]
    : [fahrenheitToCelsius(value), value];
}

export function windSpeedUnit(units: UnitSystem): string {
  return units === 'metric' ? 'm/s' : 'mph';
}

/**
 * Formats a Unix timestamp as 24-hour HH:MM in the city's local time.
 * Independent of the host timezone.
 */
export function formatLocalTime(unixSeconds: number, offsetSeconds: number): string {
  const date = new Date((unixSeconds + offsetSeconds) * 1000);
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}
