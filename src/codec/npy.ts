import { NpyDecodeError } from '../errors';
import type { NumericArray } from '../types';

/**
 * Decoder for the NumPy `.npy` array file format (versions 1.0, 2.0 and 3.0).
 *
 * Layout: magic `\x93NUMPY`, major and minor version bytes, a little-endian
 * header length (uint16 for v1, uint32 otherwise), a dict literal
 * describing `descr`, `fortran_order` and `shape`, then the raw element data.
 */

const MAGIC = [0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]; // \x93NUMPY

export interface NpyArray {
  shape: number[];
  dtype: string;
  data: NumericArray;
}

type ElementReader = (view: DataView, offset: number) => number;

interface DtypeInfo {
  size: number;
  read: (littleEndian: boolean) => ElementReader;
}

const DTYPES: Record<string, DtypeInfo> = {
  b1: { size: 1, read: () => (view, offset) => (view.getUint8(offset) === 0 ? 0 : 1) },
  i1: { size: 1, read: () => (view, offset) => view.getInt8(offset) },
  u1: { size: 1, read: () => (view, offset) => view.getUint8(offset) },
  i2: { size: 2, read: (le) => (view, offset) => view.getInt16(offset, le) },
  u2: { size: 2, read: (le) => (view, offset) => view.getUint16(offset, le) },
  i4: { size: 4, read: (le) => (view, offset) => view.getInt32(offset, le) },
  u4: { size: 4, read: (le) => (view, offset) => view.getUint32(offset, le) },
  i8: { size: 8, read: (le) => (view, offset) => toSafeNumber(view.getBigInt64(offset, le)) },
  u8: { size: 8, read: (le) => (view, offset) => toSafeNumber(view.getBigUint64(offset, le)) },
  f4: { size: 4, read: (le) => (view, offset) => view.getFloat32(offset, le) },
  f8: { size: 8, read: (le) => (view, offset) => view.getFloat64(offset, le) }
};

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

function toSafeNumber(value: bigint): number {
  if (value > MAX_SAFE || value < MIN_SAFE) {
    throw new NpyDecodeError(`64-bit value ${value} cannot be represented exactly as a number`);
  }
  return Number(value);
}

interface NpyHeader {
  descr: string;
  fortranOrder: boolean;
  shape: number[];
}

export function decodeNpy(bytes: Uint8Array): NpyArray {
  if (bytes.length < 10 || !MAGIC.every((b, i) => bytes[i] === b)) {
    throw new NpyDecodeError('payload is not an .npy array (bad magic string)');
  }
  const major = bytes[6];
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let headerLength: number;
  let headerStart: number;
  if (major === 1) {
    headerLength = view.getUint16(8, true);
    headerStart = 10;
  } else if (major === 2 || major === 3) {
    if (bytes.length < 12) throw new NpyDecodeError('truncated .npy preamble');
    headerLength = view.getUint32(8, true);
    headerStart = 12;
  } else {
    throw new NpyDecodeError(`unsupported .npy format version ${major}`);
  }

  const dataStart = headerStart + headerLength;
  if (dataStart > bytes.length) throw new NpyDecodeError('truncated .npy header');
  const headerText = new TextDecoder('utf-8').decode(bytes.subarray(headerStart, dataStart));
  const header = parseHeader(headerText);

  const byteOrder = header.descr[0];
  const dtypeInfo = DTYPES[header.descr.slice(1)];
  if (!['<', '>', '|', '='].includes(byteOrder) || !dtypeInfo) {
    throw new NpyDecodeError(`unsupported dtype ${header.descr}`);
  }
  // '=' is native order; every platform Node 20 runs on is little-endian
  const read = dtypeInfo.read(byteOrder !== '>');

  const count = header.shape.reduce((acc, dim) => acc * dim, 1);
  if (bytes.length - dataStart < count * dtypeInfo.size) {
    throw new NpyDecodeError(`expected ${count} elements of ${header.descr} but payload is too short`);
  }

  const flat: number[] = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    flat[i] = read(view, dataStart + i * dtypeInfo.size);
  }

  return {
    shape: header.shape,
    dtype: header.descr,
    data: nest(flat, header.shape, header.fortranOrder)
  };
}

function parseHeader(text: string): NpyHeader {
  const descr = /'descr'\s*:\s*'([^']+)'/.exec(text);
  const fortran = /'fortran_order'\s*:\s*(True|False)/.exec(text);
  const shape = /'shape'\s*:\s*\(([^)]*)\)/.exec(text);
  if (!descr || !fortran || !shape) {
    throw new NpyDecodeError(`malformed .npy header: ${text.trim()}`);
  }
  const dims = shape[1]
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const dim = Number(part.replace(/L$/, ''));
      if (!Number.isInteger(dim) || dim < 0) throw new NpyDecodeError(`invalid dimension ${part} in .npy shape`);
      return dim;
    });
  return { descr: descr[1], fortranOrder: fortran[1] === 'True', shape: dims };
}

/**
 * Turn flat element data into row-major nested arrays.
 */
function nest(flat: number[], shape: number[], fortranOrder: boolean): NumericArray {
  if (shape.length === 0) return flat[0];

  const strides = new Array<number>(shape.length);
  if (fortranOrder) {
    let stride = 1;
    for (let d = 0; d < shape.length; d++) {
      strides[d] = stride;
      stride *= shape[d];
    }
  } else {
    let stride = 1;
    for (let d = shape.length - 1; d >= 0; d--) {
      strides[d] = stride;
      stride *= shape[d];
    }
  }

  const build = (dim: number, offset: number): NumericArray => {
    const out: NumericArray[] = [];
    for (let i = 0; i < shape[dim]; i++) {
      const at = offset + i * strides[dim];
      out.push(dim === shape.length - 1 ? flat[at] : build(dim + 1, at));
    }
    return out;
  };
  return build(0, 0);
}
