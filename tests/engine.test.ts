import { describe, it, expect, vi } from 'vitest';
import { Connection } from '../src/api/connection';
import { Engine } from '../src/engine';
import { JobFailedError, RequestFailedError } from '../src/errors';
import type { Logger } from '../src/logger';
import { binary, empty, FakeTransport, json, npyInt64, program } from './helpers';

function engineFor(transport: FakeTransport) {
  const connection = new Connection({ token: 'token', host: 'host', port: 123, useSsl: true, transport });
  return new Engine('chip2', { connection, pollIntervalMs: 0 });
}

describe('Engine', () => {
  it('submits without waiting in runAsync', async () => {
    const transport = new FakeTransport().on('POST /jobs', json(201, { id: 'abc', status: 'open' }));
    const job = await engineFor(transport).runAsync(program, { shots: 5 });

    expect(job.status).toBe('open');
    expect(transport.paths()).toEqual(['POST /jobs']);
  });

  it('polls until the job completes and returns its result', async () => {
    const transport = new FakeTransport()
      .on('POST /jobs', json(201, { id: 'abc', status: 'queued' }))
      .on('GET /jobs/abc', json(200, { id: 'abc', status: 'queued' }))
      .on('GET /jobs/abc', json(200, { id: 'abc', status: 'complete' }))
      .on('GET /jobs/abc/result', binary(200, npyInt64([2, 2], [1, 0, 0, 1])));

    const result = await engineFor(transport).run(program, { shots: 2 });

    expect(result.samples).toEqual([
      [1, 0],
      [0, 1]
    ]);
    expect(transport.paths()).toEqual(['POST /jobs', 'GET /jobs/abc', 'GET /jobs/abc', 'GET /jobs/abc/result']);
  });

  it.each(['failed', 'cancelled'] as const)('rejects when the job ends %s', async (status) => {
    const transport = new FakeTransport()
      .on('POST /jobs', json(201, { id: 'abc', status: 'queued' }))
      .on('GET /jobs/abc', json(200, { id: 'abc', status }));

    const err = await engineFor(transport).run(program, { shots: 1 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(JobFailedError);
    expect(err).toMatchObject({ jobId: 'abc', status, message: `Job abc finished with status ${status}` });
  });

  it('propagates request failures while polling', async () => {
    const transport = new FakeTransport()
      .on('POST /jobs', json(201, { id: 'abc', status: 'queued' }))
      .on('GET /jobs/abc', json(503, { status_code: 503, code: 'Unavailable', detail: 'try later' }));

    await expect(engineFor(transport).run(program, { shots: 1 })).rejects.toThrow(RequestFailedError);
  });

  it('cancels the remote job when aborted', async () => {
    const transport = new FakeTransport()
      .on('POST /jobs', json(201, { id: 'abc', status: 'queued' }))
      .on('PATCH /jobs/abc', empty(204));
    const controller = new AbortController();
    controller.abort();

    await expect(engineFor(transport).run(program, { shots: 1, signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError'
    });
    expect(transport.paths()).toEqual(['POST /jobs', 'PATCH /jobs/abc']);
  });

  it('still rejects with the abort when cancelling the remote job fails', async () => {
    const error = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error };
    const transport = new FakeTransport()
      .on('POST /jobs', json(201, { id: 'abc', status: 'queued' }))
      .on('PATCH /jobs/abc', json(500, { status_code: 500, code: 'E1', detail: 'boom' }));
    const connection = new Connection({ token: 'token', host: 'host', port: 123, useSsl: true, transport });
    const engine = new Engine('chip2', { connection, pollIntervalMs: 0, logger });
    const controller = new AbortController();
    controller.abort();

    await expect(engine.run(program, { shots: 1, signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError'
    });
    expect(transport.paths()).toEqual(['POST /jobs', 'PATCH /jobs/abc']);
    expect(error).toHaveBeenCalledWith('Failed to cancel job abc after abort', expect.any(RequestFailedError));
  });

  it('returns at once when the job is complete on submission', async () => {
    const transport = new FakeTransport()
      .on('POST /jobs', json(201, { id: 'abc', status: 'complete' }))
      .on('GET /jobs/abc/result', binary(200, npyInt64([1, 1], [3])));

    const result = await engineFor(transport).run(program, { shots: 1 });

    expect(result.samples).toEqual([[3]]);
    expect(transport.paths()).toEqual(['POST /jobs', 'GET /jobs/abc/result']);
  });
});
