import { Tensor } from 'onnxruntime-web';
import { ShapeError } from '../errors';

type NumericData = Float32Array | Int32Array | Uint8Array;

export function floatData(tensor: Tensor, name = 'tensor'): Float32Array {
  const { data } = tensor;
  if (!(data instanceof Float32Array)) {
    throw new ShapeError(`${name}: expected float32 data, got ${tensor.type}`);
  }
  return data;
}

function numericData(tensor: Tensor, name: string): NumericData {
  const { data } = tensor;
  if (data instanceof Float32Array || data instanceof Int32Array || data instanceof Uint8Array) {
    return data;
  }
  throw new ShapeError(`${name}: unsupported tensor type ${tensor.type}`);
}

/** Size of the leading (batch) axis. */
export function batchSize(tensor: Tensor): number {
  return tensor.dims.length > 0 ? tensor.dims[0] : 0;
}

/** Number of elements in one row along the leading axis. */
export function rowSize(tensor: Tensor): number {
  let size = 1;
  for (let i = 1; i < tensor.dims.length; i++) size *= tensor.dims[i];
  return size;
}

export function rowView(tensor: Tensor, row: number, name = 'tensor'): Float32Array {
  const size = rowSize(tensor);
  return floatData(tensor, name).subarray(row * size, (row + 1) * size);
}

function tileInto(out: NumericData, src: NumericData, times: number): void {
  for (let i = 0; i < times; i++) {
    out.set(src, i * src.length);
  }
}

/**
 * Tiles the whole batch `times` times along the leading axis, so an
 * [N, ...] tensor becomes [times * N, ...] with row `k * N + b` a copy of
 * row b. The result never shares memory with the input.
 */
export function tileBatch(tensor: Tensor, times: number, name = 'tensor'): Tensor {
  const src = numericData(tensor, name);
  const dims = [batchSize(tensor) * times, ...tensor.dims.slice(1)];

  if (src instanceof Float32Array) {
    const out = new Float32Array(src.length * times);
    tileInto(out, src, times);
    return new Tensor('float32', out, dims);
  }
  if (src instanceof Int32Array) {
    const out = new Int32Array(src.length * times);
    tileInto(out, src, times);
    return new Tensor('int32', out, dims);
  }
  const out = new Uint8Array(src.length * times);
  tileInto(out, src, times);
  return tensor.type === 'bool'
    ? new Tensor('bool', out, dims)
    : new Tensor('uint8', out, dims);
}

export function assertBatchSize(tensor: Tensor | undefined, expected: number, name: string): void {
  if (!tensor) return;
  if (batchSize(tensor) !== expected) {
    throw new ShapeError(`${name}: batch size ${batchSize(tensor)} does not match ${expected} examples`);
  }
}

/** Reads a float32 [rows, len] tensor into nested arrays. */
export function toRows(tensor: Tensor, name = 'tensor'): number[][] {
  const rows: number[][] = [];
  for (let r = 0; r < batchSize(tensor); r++) {
    rows.push(Array.from(rowView(tensor, r, name)));
  }
  return rows;
}

/** Index of the largest value; ties go to the lowest index. */
export function argmax(data: ArrayLike<number>): number {
  let maxVal = -Infinity;
  let maxIdx = 0;
  for (let i = 0; i < data.length; i++) {
    if (data[i] > maxVal) {
      maxVal = data[i];
      maxIdx = i;
    }
  }
  return maxIdx;
}

/** Row-wise log-softmax of a float32 [rows, V] tensor. */
export function logSoftmax(logits: Tensor): Tensor {
  const data = floatData(logits, 'logits');
  const vocabSize = rowSize(logits);
  const out = new Float32Array(data.length);

  for (let offset = 0; offset < data.length; offset += vocabSize) {
    let maxLogit = -Infinity;
    for (let i = offset; i < offset + vocabSize; i++) {
      if (data[i] > maxLogit) maxLogit = data[i];
    }
    let expSum = 0;
    for (let i = offset; i < offset + vocabSize; i++) {
      expSum += Math.exp(data[i] - maxLogit);
    }
    const logSumExp = maxLogit + Math.log(expSum);
    for (let i = offset; i < offset + vocabSize; i++) {
      out[i] = data[i] - logSumExp;
    }
  }

  return new Tensor('float32', out, logits.dims);
}
