import { setTimeout as delay } from 'node:timers/promises';
import { Connection } from './api/connection';
import { Job } from './api/job';
import { Result } from './api/result';
import type { Program } from './circuit/program';
import { JobFailedError } from './errors';
import { Logger, silentLogger } from './logger';

export interface EngineOptions {
  connection: Connection;
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  shots: number;
  signal?: AbortSignal;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Runs programs on a remote target over an injected Connection.
 */
export class Engine {
  readonly target: string;
  private readonly connection: Connection;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(target: string, options: EngineOptions) {
    this.target = target;
    this.connection = options.connection;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Submit without waiting. The caller refreshes the returned job itself.
   */
  async runAsync(program: Program, options: RunOptions): Promise<Job> {
    return this.connection.createJob(this.target, program, options.shots);
  }

  /**
   * Submit and poll until the job is final.
   *
   * Resolves with the result of a completed job and rejects with JobFailedError
   * for a failed or cancelled one. Aborting `signal` cancels the remote job.
   */
  async run(program: Program, options: RunOptions): Promise<Result> {
    const job = await this.runAsync(program, options);
    this.logger.info(`Submitted job ${job.id} to ${this.target}`);

    try {
      while (!job.isFinal) {
        await delay(this.pollIntervalMs, undefined, { signal: options.signal });
        await job.refresh();
        this.logger.debug(`Job ${job.id} is ${job.status}`);
      }
    } catch (err) {
      if (options.signal?.aborted && !job.isFinal) {
        try {
          await job.cancel();
          this.logger.warn(`Job ${job.id} has been cancelled`);
        } catch (cancelErr) {
          // the abort stays the reported failure
          this.logger.error(`Failed to cancel job ${job.id} after abort`, cancelErr);
        }
      }
      throw err;
    }

    if (job.status !== 'complete') {
      this.logger.warn(`Job ${job.id} finished with status ${job.status}`);
      throw new JobFailedError(job.id, job.status);
    }
    return job.result;
  }
}
