import { parseArgs } from 'node:util';
import type { UnitSystem } from '../ports/WeatherPort.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_CITY = 'Kyiv';
export const DEFAULT_UNITS: UnitSystem = 'metric';

export const USAGE = `Usage: weather-report [city] [options]

Prints the current weather for a city (default: ${DEFAULT_CITY}).

Options:
  -u, --units <metric|imperial>  Unit system for the request (default: ${DEFAULT_UNITS})
  -h, --help                     Show this help

Environment:
  OPENWEATHERMAP_API_KEY         OpenWeatherMap API key (required)
  LOG_LEVEL                      Log level for diagnostics on stderr (default: warn)`;

export interface CliArgs {
  city: string;
  units: UnitSystem;
  help: boolean;
  /** Positionals after the city; they are not used. */
  ignored: string[];
}

function isUnitSystem(value: string): value is UnitSystem {
  return value === 'metric' || value === 'imperial';
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${message}. Run with --help for usage.`, { cause: error });
  }

  const { values, positionals } = parsed;
  const [first, ...rest] = positionals;
  const city = first?.trim() || DEFAULT_CITY;

  const units = values.units ?? DEFAULT_UNITS;
  if (!isUnitSystem(units)) {
    throw new ConfigurationError(`Invalid units "${units}": expected metric or imperial.`);
  }

  return {
    city,
    units,
    help: values.help ?? false,
    ignored: rest,
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      units: { type: 'string', short: 'u' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
    strict: true,
  });
}
