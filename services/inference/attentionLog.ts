import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Tensor } from 'onnxruntime-web';
import { ShapeError } from './errors';
import type { AttentionStep } from './types';
import { rowView } from './utils/tensorUtils';

export interface AttentionLog {
  src: number[][];
  lexicon?: number[][];
  attention: AttentionStep[];
  hypotheses: number[][];
}

/**
 * Picks each example's slot-0 row out of one step's attention tensors.
 * Slot 0 of example b is row b in the beam-major layout.
 */
export function attentionStep(attention: readonly Tensor[], numExamples: number): AttentionStep {
  const pick = (tensor: Tensor, name: string) =>
    Array.from({ length: numExamples }, (_, b) => Array.from(rowView(tensor, b, name)));

  const step: AttentionStep = { source: attention.length > 0 ? pick(attention[0], 'attention.source') : [] };
  if (attention.length > 1) {
    step.lexicon = pick(attention[1], 'attention.lexicon');
  }
  return step;
}

/** Reads an int32 [N, len] id tensor into nested arrays. */
export function idRows(tensor: Tensor): number[][] {
  const { data } = tensor;
  const width = tensor.dims.length > 1 ? tensor.dims[1] : 1;
  const rows: number[][] = [];
  if (!(data instanceof Int32Array)) {
    throw new ShapeError(`attention log: expected int32 ids, got ${tensor.type}`);
  }
  for (let offset = 0; offset < data.length; offset += width) {
    rows.push(Array.from(data.subarray(offset, offset + width)));
  }
  return rows;
}

export async function writeAttentionLog(file: string, log: AttentionLog): Promise<void> {
  console.log(`[AttentionLog] Writing ${log.attention.length} steps to ${file}`);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(log), 'utf-8');
}
