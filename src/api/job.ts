import { Result } from './result';
import { InvalidJobOperationError, JobNotCompletedError } from '../errors';
import { Logger, silentLogger } from '../logger';

/**
 * Job statuses as reported by the remote platform. The values are the wire values.
 */
export const JOB_STATUSES = ['open', 'queued', 'cancelled', 'complete', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/**
 * Whether a status is terminal. No transition leaves a final status.
 */
export function isFinal(status: JobStatus): boolean {
  return status === 'cancelled' || status === 'complete' || status === 'failed';
}

/**
 * The connection operations a job needs. Jobs hold this as a borrowed handle;
 * they never own or close the connection.
 */
export interface JobConnection {
  getJobStatus(jobId: string): Promise<JobStatus>;
  getJobResult(jobId: string): Promise<Result>;
  cancelJob(jobId: string): Promise<void>;
}

/**
 * A remote job that can be queried for its status or result.
 *
 * Jobs are normally obtained from `Connection.createJob` or `Connection.getJob`.
 * The local status is a cache of what the server last reported and only
 * `refresh()` updates it.
 */
export class Job {
  readonly id: string;
  private _status: JobStatus;
  private _result: Result | undefined;
  private readonly connection: JobConnection;
  private readonly logger: Logger;

  /**
   * A job the server already reports as complete must be given its result.
   */
  constructor(id: string, status: JobStatus, connection: JobConnection, logger: Logger = silentLogger, result?: Result) {
    this.id = id;
    this._status = status;
    this._result = result;
    this.connection = connection;
    this.logger = logger;
  }

  get status(): JobStatus {
    return this._status;
  }

  get isFinal(): boolean {
    return isFinal(this._status);
  }

  /**
   * Only defined for completed jobs; throws `JobNotCompletedError` otherwise.
   */
  get result(): Result {
    if (this._status !== 'complete' || this._result === undefined) {
      throw new JobNotCompletedError(
        `The result is undefined for jobs that are not completed (current status: ${this._status})`
      );
    }
    return this._result;
  }

  /**
   * Refresh the status, and fetch the result if the job has just completed.
   * Has no effect on a job that is already final.
   */
  async refresh(): Promise<void> {
    if (this.isFinal) {
      this.logger.warn(`A ${this._status} job cannot be refreshed`);
      return;
    }
    const status = await this.connection.getJobStatus(this.id);
    if (status === 'complete') {
      // status and result are committed together
      const result = await this.connection.getJobResult(this.id);
      this._result = result;
    }
    this._status = status;
  }

  /**
   * Request cancellation. The local status is left alone until the next refresh.
   */
  async cancel(): Promise<void> {
    if (this.isFinal) {
      throw new InvalidJobOperationError(`A ${this._status} job cannot be cancelled`);
    }
    await this.connection.cancelJob(this.id);
  }

  toString(): string {
    return `<Job: id=${this.id}, status=${this._status}>`;
  }
}
