import { describe, it, expect } from 'vitest';
import { Tensor } from 'onnxruntime-web';
import { applyLexiconDropout } from '../../../services/inference/lexiconDropout';
import { INFERENCE_CONFIG } from '../../../services/inference/config';
import { ConfigurationError, ShapeError } from '../../../services/inference/errors';
import { TOKENS, intRows } from '../../helpers/scriptedScorer';

function lexiconInputs() {
  return {
    lexicon: new Tensor('int32', Int32Array.from([7, 8, 9, 10, 11, 12, 13, 14]), [2, 4]),
    lexiconMask: new Tensor('bool', new Uint8Array(8), [2, 4]),
  };
}

function maskRows(tensor: Tensor): number[] {
  if (!(tensor.data instanceof Uint8Array)) throw new Error(`expected bool, got ${tensor.type}`);
  return Array.from(tensor.data);
}

describe('applyLexiconDropout', () => {
  it('replaces the rows whose draw falls under the rate', () => {
    const draws = [0.9, 0.1];
    const inputs = lexiconInputs();
    const out = applyLexiconDropout(inputs, 0.5, () => draws.shift() ?? 1, TOKENS);

    expect(intRows(out.lexicon)).toEqual([7, 8, 9, 10, TOKENS.sos, TOKENS.eos, TOKENS.pad, TOKENS.pad]);
    expect(maskRows(out.lexiconMask)).toEqual([0, 0, 0, 0, 0, 0, 0, 1]);
    expect(out.lexicon.dims).toEqual([2, 4]);
  });

  it('leaves the inputs untouched', () => {
    const inputs = lexiconInputs();
    applyLexiconDropout(inputs, 1, () => 0, TOKENS);

    expect(intRows(inputs.lexicon)).toEqual([7, 8, 9, 10, 11, 12, 13, 14]);
    expect(maskRows(inputs.lexiconMask)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('draws once per example', () => {
    let draws = 0;
    applyLexiconDropout(lexiconInputs(), 0.3, () => {
      draws++;
      return 0.5;
    });
    expect(draws).toBe(2);
  });

  it('never replaces anything at rate 0', () => {
    const out = applyLexiconDropout(lexiconInputs(), 0, () => 0, TOKENS);
    expect(intRows(out.lexicon)).toEqual([7, 8, 9, 10, 11, 12, 13, 14]);
  });

  it('defaults to the configured inference rate', () => {
    expect(INFERENCE_CONFIG.LEXICON_DROPOUT).toBe(0);
    const out = applyLexiconDropout(lexiconInputs(), undefined, () => 0, TOKENS);
    expect(intRows(out.lexicon)).toEqual([7, 8, 9, 10, 11, 12, 13, 14]);
  });

  it('uses the default special tokens when none are given', () => {
    const out = applyLexiconDropout(lexiconInputs(), 1, () => 0.5);
    expect(intRows(out.lexicon).slice(0, 4)).toEqual([2, 3, 0, 0]);
  });

  it.each([-0.1, 1.5, Number.NaN])('rejects rate %s', (rate) => {
    expect(() => applyLexiconDropout(lexiconInputs(), rate)).toThrow(ConfigurationError);
  });

  it('rejects a mask that does not match the ids', () => {
    const inputs = lexiconInputs();
    inputs.lexiconMask = new Tensor('bool', new Uint8Array(4), [1, 4]);
    expect(() => applyLexiconDropout(inputs, 0.5)).toThrow(ShapeError);
  });

  it('rejects non-integer ids', () => {
    const inputs = {
      lexicon: new Tensor('float32', new Float32Array(4), [1, 4]),
      lexiconMask: new Tensor('bool', new Uint8Array(4), [1, 4]),
    };
    expect(() => applyLexiconDropout(inputs, 0.5)).toThrow(/expected int32 ids/);
  });
});
