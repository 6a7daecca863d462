import type { Colorette } from 'colorette';
import { loadConfig, type Config, type Environment } from '../config/index.js';
import { OpenWeatherAdapter } from '../adapters/weather/OpenWeatherAdapter.js';
import { ReportFormatter } from '../core/report/ReportFormatter.js';
import type { WeatherPort } from '../ports/WeatherPort.js';
import { WeatherAppError } from '../utils/errors.js';
import { createLogger, generateCorrelationId, setCorrelationId, setLogLevel } from '../utils/logger.js';
import { USAGE, parseCliArgs } from './args.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIO {
  env: Environment;
  stdout: OutputStream;
  stderr: OutputStream;
  colors: Colorette;
  createWeatherPort?: (config: Config) => WeatherPort;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Runs one invocation: arguments, configuration, a single weather request,
 * then the rendered report on stdout. Returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  setCorrelationId(generateCorrelationId());

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout.write(`${USAGE}\n`);
      return EXIT_OK;
    }

    const config = loadConfig(io.env);
    setLogLevel(config.logLevel);

    const logger = createLogger({ component: 'cli' });
    if (args.ignored.length > 0) {
      logger.warn({ ignored: args.ignored }, 'Only one city is supported; extra arguments ignored');
    }

    const createWeatherPort = io.createWeatherPort ?? ((cfg: Config) => new OpenWeatherAdapter(cfg));
    const weather = createWeatherPort(config);
    const report = await weather.getCurrentWeather(args.city, args.units);

    io.stdout.write(`${new ReportFormatter(io.colors).format(report)}\n`);
    return EXIT_OK;
  } catch (error) {
    io.stderr.write(`${io.colors.red('Error:')} ${describeFailure(error)}\n`);
    return EXIT_FAILURE;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof WeatherAppError) {
    return error.message;
  }
  return `Unexpected failure: ${error instanceof Error ? error.message : String(error)}`;
}
