import { Tensor } from 'onnxruntime-web';
import { INFERENCE_CONFIG, SPECIAL_TOKENS } from './config';
import { ConfigurationError, ShapeError } from './errors';
import type { SpecialTokens } from './types';

export interface LexiconInputs {
  lexicon: Tensor;
  lexiconMask: Tensor;
}

/**
 * Hides the analyzer's candidate lemma for a random subset of examples so
 * the model learns not to copy it blindly. Each row is independently
 * replaced with `[SOS, EOS, PAD, ...]` with probability `rate`; its mask
 * leaves the first three positions visible. Returns new tensors.
 * `rate` defaults to `INFERENCE_CONFIG.LEXICON_DROPOUT`.
 */
export function applyLexiconDropout(
  { lexicon, lexiconMask }: LexiconInputs,
  rate = INFERENCE_CONFIG.LEXICON_DROPOUT,
  random: () => number = Math.random,
  specialTokens: SpecialTokens = SPECIAL_TOKENS,
): LexiconInputs {
  if (!(rate >= 0 && rate <= 1)) {
    throw new ConfigurationError(`lexicon dropout rate must be within [0, 1], got ${rate}`);
  }

  const ids = lexicon.data;
  const mask = lexiconMask.data;
  if (!(ids instanceof Int32Array)) {
    throw new ShapeError(`lexicon: expected int32 ids, got ${lexicon.type}`);
  }
  if (!(mask instanceof Uint8Array)) {
    throw new ShapeError(`lexiconMask: expected bool mask, got ${lexiconMask.type}`);
  }
  if (lexicon.dims.length !== 2 || lexiconMask.dims.join() !== lexicon.dims.join()) {
    throw new ShapeError(`lexicon [${lexicon.dims.join(', ')}] and mask [${lexiconMask.dims.join(', ')}] must be the same 2-D shape`);
  }

  const [numExamples, width] = lexicon.dims;
  const nextIds = ids.slice();
  const nextMask = mask.slice();

  for (let b = 0; b < numExamples; b++) {
    if (!(random() < rate)) continue;
    const offset = b * width;
    for (let i = 0; i < width; i++) {
      nextIds[offset + i] = i === 0 ? specialTokens.sos : i === 1 ? specialTokens.eos : specialTokens.pad;
      nextMask[offset + i] = i < 3 ? 0 : 1;
    }
  }

  return {
    lexicon: new Tensor('int32', nextIds, lexicon.dims),
    lexiconMask: new Tensor('bool', nextMask, lexiconMask.dims),
  };
}
