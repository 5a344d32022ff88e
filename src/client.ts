import type { CircuitJobsConfig, CircuitJobsOverrides } from './types';
import { mergeConfig } from './config';
import { Connection } from './api/connection';
import { Engine } from './engine';
import { ConfigError } from './errors';
import { createConsoleLogger, Logger } from './logger';

/**
 * High-level client entrypoint exported as `CircuitJobsClient`.
 * Builds a single Connection and hands it to every engine it creates.
 */
export class CircuitJobsClient {
  public config: CircuitJobsConfig;
  public connection: Connection;
  private logger: Logger;

  constructor(opts: Partial<CircuitJobsConfig> & CircuitJobsOverrides = {}) {
    const { transport, serializer, logger, ...cfg } = opts;
    this.config = mergeConfig(cfg);
    if (!this.config.token) throw new ConfigError('an API token is required');
    this.logger = logger ?? createConsoleLogger(this.config.logLevel);
    this.connection = new Connection({
      token: this.config.token,
      host: this.config.host,
      port: this.config.port,
      useSsl: this.config.useSsl,
      timeoutMs: this.config.timeoutMs,
      verbose: this.config.verbose,
      transport,
      serializer,
      logger: this.logger
    });
  }

  engine(target: string, opts: { pollIntervalMs?: number } = {}): Engine {
    return new Engine(target, {
      connection: this.connection,
      pollIntervalMs: opts.pollIntervalMs ?? this.config.pollIntervalMs,
      logger: this.logger
    });
  }
}
