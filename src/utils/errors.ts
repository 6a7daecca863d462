export class WeatherAppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherAppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends WeatherAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

export class NetworkError extends WeatherAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NETWORK_ERROR', options);
    this.name = 'NetworkError';
  }
}

export class HttpError extends WeatherAppError {
  public readonly status: number;
  public readonly city: string;

  constructor(city: string, status: number, detail?: string, options?: ErrorOptions) {
    const suffix = detail ? `: ${detail}` : '';
    super(`Weather request for "${city}" failed with HTTP ${status}${suffix}`, 'HTTP_ERROR', options);
    this.name = 'HttpError';
    this.status = status;
    this.city = city;
  }
}

export class DecodeError extends WeatherAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
  }
}
