import type { Transport } from './api/transport';
import type { CircuitSerializer } from './circuit/program';
import type { Logger, LogLevel } from './logger';

/**
 * Global SDK configuration.
 */
export interface CircuitJobsConfig {
  token?: string;
  host: string;
  port: number;
  useSsl: boolean;
  timeoutMs: number; // per-request timeout applied by the default transport
  pollIntervalMs: number;
  logLevel: LogLevel;
  verbose?: boolean;
}

/**
 * Collaborators a caller may swap out. Everything here has a default.
 */
export interface CircuitJobsOverrides {
  transport?: Transport;
  serializer?: CircuitSerializer;
  logger?: Logger;
}

export type NumericArray = number | NumericArray[];

/**
 * Target device a circuit is compiled for, plus its run options.
 */
export interface TargetSpec {
  name: string;
  options: Record<string, string | number | boolean>;
}
