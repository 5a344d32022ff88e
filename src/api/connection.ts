import { z } from 'zod';
import { FetchTransport, HttpMethod, Transport, TransportResponse } from './transport';
import { Job, JOB_STATUSES, JobConnection, JobStatus } from './job';
import { Result } from './result';
import { decodeNpy } from '../codec/npy';
import { BlackbirdSerializer } from '../circuit/blackbird';
import type { CircuitSerializer, Program } from '../circuit/program';
import type { CircuitJobsOverrides } from '../types';
import { DEFAULTS } from '../config';
import { Logger, silentLogger } from '../logger';
import { NotImplementedError, RequestFailedError, ResponseParseError } from '../errors';

export interface ConnectionOptions extends CircuitJobsOverrides {
  token: string;
  host?: string;
  port?: number;
  useSsl?: boolean;
  timeoutMs?: number;
  verbose?: boolean;
}

const jobBodySchema = z.object({
  id: z.string().min(1),
  status: z.enum(JOB_STATUSES)
});

const errorBodySchema = z
  .object({
    status_code: z.union([z.number(), z.string()]).optional().catch(undefined),
    code: z.union([z.number(), z.string()]).optional().catch(undefined),
    detail: z.unknown().transform(renderDetail)
  })
  .passthrough();

/**
 * Manages the connection to the remote job execution platform and exposes the
 * job operations.
 *
 * A Connection holds no job state and can be shared by any number of jobs.
 *
 * @example
 * const connection = new Connection({ token: 'test-token' });
 * await connection.ping(); // true if the platform is reachable
 * const job = await connection.createJob('chip2', program, 123);
 * job.status; // 'queued'
 */
export class Connection implements JobConnection {
  readonly token: string;
  readonly host: string;
  readonly port: number;
  readonly useSsl: boolean;
  readonly baseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly transport: Transport;
  private readonly serializer: CircuitSerializer;
  private readonly logger: Logger;
  private readonly verbose: boolean;

  constructor(options: ConnectionOptions) {
    this.token = options.token;
    this.host = options.host ?? DEFAULTS.host;
    this.port = options.port ?? DEFAULTS.port;
    this.useSsl = options.useSsl ?? DEFAULTS.useSsl;
    this.verbose = options.verbose ?? false;
    this.baseUrl = `http${this.useSsl ? 's' : ''}://${this.host}:${this.port}`;
    this.headers = Object.freeze({ Authorization: this.token });
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: options.timeoutMs ?? DEFAULTS.timeoutMs });
    this.serializer = options.serializer ?? new BlackbirdSerializer();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Submit a program to run on `target` with the given number of shots.
   */
  async createJob(target: string, program: Program, shots: number): Promise<Job> {
    const circuit = this.serializer.serialize(program, { name: target, options: { shots } });
    const resp = await this.request('POST', '/jobs', {
      body: JSON.stringify({ circuit }),
      headers: { 'Content-Type': 'application/json' }
    });
    if (resp.status === 201) {
      const job = await this.toJob(resp);
      if (this.verbose) this.logger.info('The job was successfully submitted.', { id: job.id });
      return job;
    }
    throw this.failure('create job', resp);
  }

  /**
   * Listing the user's jobs is not supported by the platform yet.
   */
  async getAllJobs(after: Date = new Date(0)): Promise<Job[]> {
    throw new NotImplementedError();
  }

  /**
   * Fetch a job by id. A job that is already complete comes with its result.
   */
  async getJob(jobId: string): Promise<Job> {
    return this.toJob(await this.fetchJob(jobId));
  }

  async getJobStatus(jobId: string): Promise<JobStatus> {
    const body = parseJobBody(await this.fetchJob(jobId));
    return body.status;
  }

  /**
   * Fetch and decode the `.npy` sample payload of a completed job.
   */
  async getJobResult(jobId: string): Promise<Result> {
    const resp = await this.request('GET', `/jobs/${encodeURIComponent(jobId)}/result`, {
      headers: { Accept: 'application/x-numpy' }
    });
    if (resp.status === 200) {
      const array = decodeNpy(resp.body);
      return new Result(array.data, array.shape, false);
    }
    throw this.failure('get job result', resp);
  }

  async cancelJob(jobId: string): Promise<void> {
    const body: { status: JobStatus } = { status: 'cancelled' };
    const resp = await this.request('PATCH', `/jobs/${encodeURIComponent(jobId)}`, {
      body: JSON.stringify(body),
      headers: { 'Content-Type': 'application/json' }
    });
    if (resp.status === 204) {
      if (this.verbose) this.logger.info('The job was successfully cancelled.', { id: jobId });
      return;
    }
    throw this.failure('cancel job', resp);
  }

  /**
   * Liveness probe. Resolves to false on any failure and never rejects.
   */
  async ping(): Promise<boolean> {
    try {
      const resp = await this.request('GET', '/healthz');
      return resp.status === 200;
    } catch (err) {
      this.logger.debug('ping failed', err);
      return false;
    }
  }

  toString(): string {
    return `<Connection: token=${this.token}, host=${this.host}>`;
  }

  private request(
    method: HttpMethod,
    path: string,
    extra: { body?: string; headers?: Record<string, string> } = {}
  ): Promise<TransportResponse> {
    return this.transport.request({
      method,
      url: this.baseUrl + path,
      headers: { ...extra.headers, ...this.headers },
      body: extra.body
    });
  }

  private async fetchJob(jobId: string): Promise<TransportResponse> {
    const resp = await this.request('GET', `/jobs/${encodeURIComponent(jobId)}`);
    if (resp.status === 200) return resp;
    throw this.failure('get job', resp);
  }

  private async toJob(resp: TransportResponse): Promise<Job> {
    const { id, status } = parseJobBody(resp);
    const result = status === 'complete' ? await this.getJobResult(id) : undefined;
    return new Job(id, status, this, this.logger, result);
  }

  private failure(operation: string, resp: TransportResponse): RequestFailedError {
    const message = formatErrorMessage(parseJson(resp.body));
    this.logger.error(`Failed to ${operation}: ${message}`);
    return new RequestFailedError(message, operation, resp.status);
  }
}

/**
 * Format a platform error body as `"{status_code} ({code}): {detail}"`.
 * Missing fields are rendered as empty strings; a structured `detail` is
 * rendered as JSON.
 */
export function formatErrorMessage(body: unknown): string {
  const parsed = errorBodySchema.safeParse(body);
  const fields: z.infer<typeof errorBodySchema> = parsed.success ? parsed.data : {};
  return `${fields.status_code ?? ''} (${fields.code ?? ''}): ${fields.detail ?? ''}`;
}

function renderDetail(value: unknown): string | number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' || typeof value === 'number') return value;
  return JSON.stringify(value);
}

function parseJobBody(resp: TransportResponse): z.infer<typeof jobBodySchema> {
  const parsed = jobBodySchema.safeParse(parseJson(resp.body));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ResponseParseError(`Unexpected job payload from server: ${issues}`);
  }
  return parsed.data;
}

function parseJson(body: Uint8Array): unknown {
  const text = new TextDecoder().decode(body);
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
