import type { Transport, TransportRequest, TransportResponse } from '../src/api/transport';
import type { Program } from '../src/circuit/program';

type Route = `${TransportRequest['method']} ${string}`;

/**
 * In-process stand-in for the HTTP transport. Responses are queued per
 * "METHOD /path" and every request is recorded.
 */
export class FakeTransport implements Transport {
  readonly calls: TransportRequest[] = [];
  private readonly routes = new Map<string, TransportResponse[]>();

  constructor(private readonly baseUrl = 'https://host:123') {}

  on(route: Route, response: TransportResponse): this {
    const queue = this.routes.get(route) ?? [];
    queue.push(response);
    this.routes.set(route, queue);
    return this;
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    this.calls.push(req);
    const route = `${req.method} ${req.url.slice(this.baseUrl.length)}`;
    const queue = this.routes.get(route);
    const next = queue?.shift();
    if (!next) throw new Error(`unexpected request ${route}`);
    return next;
  }

  paths(): string[] {
    return this.calls.map((call) => `${call.method} ${call.url.slice(this.baseUrl.length)}`);
  }
}

export function json(status: number, payload: unknown): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: new TextEncoder().encode(JSON.stringify(payload))
  };
}

export function empty(status: number): TransportResponse {
  return { status, headers: {}, body: new Uint8Array() };
}

export function binary(status: number, body: Uint8Array): TransportResponse {
  return { status, headers: { 'content-type': 'application/x-numpy' }, body };
}

/**
 * Build a version 1.0 `.npy` payload holding little-endian int64 values.
 */
export function npyInt64(shape: number[], values: number[], fortranOrder = false): Uint8Array {
  const dims = shape.length === 1 ? `${shape[0]},` : shape.join(', ');
  let header = `{'descr': '<i8', 'fortran_order': ${fortranOrder ? 'True' : 'False'}, 'shape': (${dims}), }`;
  const preamble = 10;
  const padding = 64 - ((preamble + header.length + 1) % 64);
  header = header + ' '.repeat(padding % 64) + '\n';

  const out = new Uint8Array(preamble + header.length + values.length * 8);
  out.set([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, 1, 0], 0);
  const view = new DataView(out.buffer);
  view.setUint16(8, header.length, true);
  out.set(new TextEncoder().encode(header), preamble);
  values.forEach((value, i) => view.setBigInt64(preamble + header.length + i * 8, BigInt(value), true));
  return out;
}

export const program: Program = {
  name: 'displacement',
  version: '1.0',
  modes: 2,
  operations: [
    { name: 'Dgate', params: [0.5], modes: [0] },
    { name: 'MeasureFock', params: [], modes: [0, 1] }
  ]
};
