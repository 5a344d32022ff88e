import { describe, it, expect } from 'vitest';
import { decodeNpy } from '../src/codec/npy';
import { NpyDecodeError } from '../src/errors';
import { npyInt64 } from './helpers';

/**
 * Build an `.npy` file from a header dict and already-encoded element bytes.
 */
function npy(header: string, data: Uint8Array, version = 1): Uint8Array {
  const preamble = version === 1 ? 10 : 12;
  const text = header + '\n';
  const out = new Uint8Array(preamble + text.length + data.length);
  out.set([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, version, 0], 0);
  const view = new DataView(out.buffer);
  if (version === 1) view.setUint16(8, text.length, true);
  else view.setUint32(8, text.length, true);
  out.set(new TextEncoder().encode(text), preamble);
  out.set(data, preamble + text.length);
  return out;
}

describe('decodeNpy', () => {
  it('decodes a 2-d int64 sample array', () => {
    const array = decodeNpy(npyInt64([1, 8], [0, 1, 0, 2, 1, 0, 0, 0]));
    expect(array.shape).toEqual([1, 8]);
    expect(array.dtype).toBe('<i8');
    expect(array.data).toEqual([[0, 1, 0, 2, 1, 0, 0, 0]]);
  });

  it('decodes a 1-d array', () => {
    expect(decodeNpy(npyInt64([3], [4, -5, 6])).data).toEqual([4, -5, 6]);
  });

  it('reorders fortran-ordered data into rows', () => {
    // column-major storage of [[1, 2, 3], [4, 5, 6]]
    const array = decodeNpy(npyInt64([2, 3], [1, 4, 2, 5, 3, 6], true));
    expect(array.data).toEqual([
      [1, 2, 3],
      [4, 5, 6]
    ]);
  });

  it('decodes big-endian int32 and a version 2 header', () => {
    const data = new Uint8Array(8);
    const view = new DataView(data.buffer);
    view.setInt32(0, 7, false);
    view.setInt32(4, -1, false);
    const array = decodeNpy(npy("{'descr': '>i4', 'fortran_order': False, 'shape': (2,), }", data, 2));
    expect(array.data).toEqual([7, -1]);
  });

  it('decodes float64 values', () => {
    const data = new Uint8Array(16);
    const view = new DataView(data.buffer);
    view.setFloat64(0, 0.25, true);
    view.setFloat64(8, -1.5, true);
    const array = decodeNpy(npy("{'descr': '<f8', 'fortran_order': False, 'shape': (1, 2), }", data));
    expect(array.data).toEqual([[0.25, -1.5]]);
  });

  it('decodes booleans as 0 and 1', () => {
    const array = decodeNpy(npy("{'descr': '|b1', 'fortran_order': False, 'shape': (3,), }", Uint8Array.from([1, 0, 1])));
    expect(array.data).toEqual([1, 0, 1]);
  });

  it('decodes a 0-d array as a scalar', () => {
    const array = decodeNpy(npy("{'descr': '|u1', 'fortran_order': False, 'shape': (), }", Uint8Array.from([9])));
    expect(array.shape).toEqual([]);
    expect(array.data).toBe(9);
  });

  it('decodes an empty array', () => {
    expect(decodeNpy(npyInt64([0], [])).data).toEqual([]);
  });

  it('rejects a payload without the magic string', () => {
    expect(() => decodeNpy(new TextEncoder().encode('not an array file'))).toThrow(NpyDecodeError);
  });

  it('rejects an unknown format version', () => {
    const bytes = npyInt64([1], [1]);
    bytes[6] = 9;
    expect(() => decodeNpy(bytes)).toThrow('unsupported .npy format version 9');
  });

  it('rejects unsupported dtypes', () => {
    const bytes = npy("{'descr': '<U4', 'fortran_order': False, 'shape': (1,), }", new Uint8Array(16));
    expect(() => decodeNpy(bytes)).toThrow('unsupported dtype <U4');
  });

  it('rejects truncated element data', () => {
    const bytes = npyInt64([1, 8], [0, 1, 0, 2, 1, 0, 0, 0]);
    expect(() => decodeNpy(bytes.subarray(0, bytes.length - 8))).toThrow(
      'expected 8 elements of <i8 but payload is too short'
    );
  });

  it('rejects 64-bit integers that do not fit a number exactly', () => {
    const data = new Uint8Array(8);
    new DataView(data.buffer).setBigUint64(0, BigInt(Number.MAX_SAFE_INTEGER) + BigInt(1), true);
    const bytes = npy("{'descr': '<u8', 'fortran_order': False, 'shape': (1,), }", data);

    expect(() => decodeNpy(bytes)).toThrow(NpyDecodeError);
    expect(() => decodeNpy(bytes)).toThrow('64-bit value 9007199254740992 cannot be represented exactly as a number');
  });

  it('keeps the largest safe 64-bit integer', () => {
    const array = decodeNpy(npyInt64([1], [Number.MAX_SAFE_INTEGER]));
    expect(array.data).toEqual([Number.MAX_SAFE_INTEGER]);
  });
});
