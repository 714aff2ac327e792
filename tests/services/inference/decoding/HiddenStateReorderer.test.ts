import { describe, it, expect } from 'vitest';
import { Tensor } from 'onnxruntime-web';
import { reorderHiddenState } from '../../../../services/inference/decoding/HiddenStateReorderer';
import { InvariantError, ShapeError } from '../../../../services/inference/errors';
import { floatData } from '../../../../services/inference/utils/tensorUtils';

function stateOf(values: number[], dims: number[]): Tensor {
  return new Tensor('float32', Float32Array.from(values), dims);
}

describe('reorderHiddenState', () => {
  it('moves slot 1 into slot 0 when the origin flips', () => {
    // 1 example, beam 2, 2 dims per row
    const hidden = stateOf([1, 2, 3, 4], [2, 2]);
    const before = Array.from(floatData(hidden));

    reorderHiddenState({ hidden }, 0, [1, 0], 2);

    expect(Array.from(floatData(hidden)).slice(0, 2)).toEqual(before.slice(2, 4));
    expect(Array.from(floatData(hidden))).toEqual([3, 4, 1, 2]);
  });

  it('reorders every tensor in the state', () => {
    const hidden = stateOf([1, 2, 3], [3, 1]);
    const cell = stateOf([10, 20, 30], [3, 1]);

    reorderHiddenState({ hidden, cell }, 0, [2, 2, 0], 3);

    expect(Array.from(floatData(hidden))).toEqual([3, 3, 1]);
    expect(Array.from(floatData(cell))).toEqual([30, 30, 10]);
  });

  it('touches only the rows of the given example in a beam-major batch', () => {
    // beam 2 x batch 2: rows are [k0b0, k0b1, k1b0, k1b1]
    const hidden = stateOf([0, 1, 10, 11], [4, 1]);

    reorderHiddenState({ hidden }, 1, [1, 0], 2);

    expect(Array.from(floatData(hidden))).toEqual([0, 11, 10, 1]);
  });

  it('keeps higher-rank state rows intact', () => {
    const hidden = stateOf([1, 2, 3, 4, 5, 6, 7, 8], [2, 2, 2]);

    reorderHiddenState({ hidden }, 0, [1, 1], 2);

    expect(Array.from(floatData(hidden))).toEqual([5, 6, 7, 8, 5, 6, 7, 8]);
  });

  it('raises when the rows do not divide by the beam width', () => {
    const hidden = stateOf([1, 2, 3], [3, 1]);
    expect(() => reorderHiddenState({ hidden }, 0, [0, 1], 2)).toThrow(InvariantError);
  });

  it('raises when the origin does not cover the beam', () => {
    const hidden = stateOf([1, 2], [2, 1]);
    expect(() => reorderHiddenState({ hidden }, 0, [0], 2)).toThrow(/1 backpointers for a beam of 2/);
  });

  it('raises for an example outside the batch', () => {
    const hidden = stateOf([1, 2], [2, 1]);
    expect(() => reorderHiddenState({ hidden }, 1, [0, 1], 2)).toThrow(InvariantError);
  });

  it('rejects non-float state', () => {
    const hidden = new Tensor('int32', Int32Array.from([1, 2]), [2, 1]);
    expect(() => reorderHiddenState({ hidden }, 0, [1, 0], 2)).toThrow(ShapeError);
  });
});
