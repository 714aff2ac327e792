import { InvariantError } from '../errors';
import type { DecoderState } from '../types';
import { batchSize, floatData, rowSize } from '../utils/tensorUtils';

/**
 * Rewrites one example's beam slots in every state tensor so that slot k
 * holds what slot `origin[k]` held before the call. Rows are beam-major:
 * slot k of example b lives at row `k * N + b`.
 */
export function reorderHiddenState(
  state: DecoderState,
  exampleIndex: number,
  origin: readonly number[],
  beamWidth: number,
): void {
  if (origin.length !== beamWidth) {
    throw new InvariantError(`reorder: ${origin.length} backpointers for a beam of ${beamWidth}`);
  }

  for (const [name, tensor] of Object.entries(state)) {
    const rows = batchSize(tensor);
    if (rows % beamWidth !== 0) {
      throw new InvariantError(`reorder: ${name} has ${rows} rows, not divisible by beam width ${beamWidth}`);
    }
    const numExamples = rows / beamWidth;
    if (exampleIndex < 0 || exampleIndex >= numExamples) {
      throw new InvariantError(`reorder: example ${exampleIndex} out of range for ${name} (${numExamples} examples)`);
    }

    const data = floatData(tensor, name);
    const size = rowSize(tensor);
    const rowOf = (slot: number) => (slot * numExamples + exampleIndex) * size;

    // Snapshot first: origins may point at slots this loop overwrites.
    const before = new Float32Array(beamWidth * size);
    for (let k = 0; k < beamWidth; k++) {
      before.set(data.subarray(rowOf(k), rowOf(k) + size), k * size);
    }
    for (let k = 0; k < beamWidth; k++) {
      const from = origin[k];
      data.set(before.subarray(from * size, (from + 1) * size), rowOf(k));
    }
  }
}
