import { describe, it, expect } from 'vitest';
import { decodeCurrentWeather } from '../../adapters/weather/openWeatherSchema.js';
import { DecodeError } from '../../utils/errors.js';
import { currentWeatherPayload, sampleReport } from '../fixtures.js';

describe('decodeCurrentWeather', () => {
  it('maps the provider payload to a report', () => {
    expect(decodeCurrentWeather(currentWeatherPayload(), 'metric')).toEqual(sampleReport());
  });

  it('keeps the requested unit system on the report', () => {
    expect(decodeCurrentWeather(currentWeatherPayload(), 'imperial').units).toBe('imperial');
  });

  it('defaults country and timezone when the provider omits them', () => {
    const payload = currentWeatherPayload();
    payload.sys = { sunrise: 1718417400, sunset: 1718477400 };
    delete payload.timezone;

    const report = decodeCurrentWeather(payload, 'metric');
    expect(report.country).toBe('');
    expect(report.timezoneOffset).toBe(0);
  });

  it('describes an empty weather array as unknown', () => {
    const payload = { ...currentWeatherPayload(), weather: [] };
    expect(decodeCurrentWeather(payload, 'metric').condition).toEqual({
      code: null,
      description: 'Unknown',
    });
  });

  it('rejects a payload without a temperature', () => {
    const payload = currentWeatherPayload();
    payload.main = { feels_like: 20, pressure: 1015, humidity: 40 };

    expect(() => decodeCurrentWeather(payload, 'metric')).toThrow(DecodeError);
    expect(() => decodeCurrentWeather(payload, 'metric')).toThrow(
      'Unexpected weather response: main.temp: Required'
    );
  });

  it('rejects a payload that is not an object', () => {
    expect(() => decodeCurrentWeather('city not found', 'metric')).toThrow(
      'Unexpected weather response: (root): Expected object, received string'
    );
  });
});
