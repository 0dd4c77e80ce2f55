/**
 * A source could not be read: network error, timeout, non-2xx status or a
 * payload that does not have the expected shape.
 */
export class SourceFetchError extends Error {
  readonly source: string;
  readonly url: string;
  readonly status?: number;

  constructor(source: string, url: string, message: string, status?: number) {
    super(`${source}: ${message}`);
    this.name = 'SourceFetchError';
    this.source = source;
    this.url = url;
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
