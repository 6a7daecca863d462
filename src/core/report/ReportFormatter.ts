import type { Colorette } from 'colorette';
import type { WeatherReport } from '../../ports/WeatherPort.js';
import { getWeatherEmoji } from './conditionEmoji.js';
import { bothScales, formatLocalTime, windSpeedUnit } from './units.js';

/**
 * Renders a WeatherReport as the fixed terminal layout.
 *
 * Output depends only on the report and on whether the given colorette
 * instance emits escape codes.
 */
export class ReportFormatter {
  constructor(private readonly colors: Colorette) {}

  format(report: WeatherReport): string {
    const c = this.colors;
    const emoji = getWeatherEmoji(report.condition.code, report.condition.description);
    const location = report.country
      ? `${c.blue(report.city)}, ${c.blue(report.country)}`
      : c.blue(report.city);

    const lines = [
      `${c.green('🌍')} Weather Report ${c.green('🌍')}`,
      `${emoji} ${location}`,
      '',
      `${c.yellow('📊')} Weather Conditions:`,
      this.field('Status', c.yellow(report.condition.description)),
      this.field('Temperature', this.temperature(report.temperature, report)),
      this.field('Feels like', this.temperature(report.feelsLike, report)),
      '',
      `${c.cyan('🌬️')} Additional Details:`,
      this.field('Humidity', `${report.humidity}%`),
      this.field('Wind speed', `${report.windSpeed.toFixed(1)} ${windSpeedUnit(report.units)}`),
      this.field('Pressure', `${report.pressure} hPa`),
      '',
      `${c.magenta('🌅')} Celestial Events:`,
      this.field('Sunrise', formatLocalTime(report.sunrise, report.timezoneOffset)),
      this.field('Sunset', formatLocalTime(report.sunset, report.timezoneOffset)),
    ];

    return lines.join('\n');
  }

  private field(label: string, value: string): string {
    return `   ${this.colors.green(label)}: ${value}`;
  }

  private temperature(value: number, report: WeatherReport): string {
    const [celsius, fahrenheit] = bothScales(value, report.units);
    return `${celsius.toFixed(1)}°C / ${fahrenheit.toFixed(1)}°F`;
  }
}
