import { describe, it, expect } from 'vitest';
import { INFERENCE_CONFIG, SPECIAL_TOKENS, resolveDecodeOptions } from '../../../services/inference/config';
import { ConfigurationError } from '../../../services/inference/errors';
import type { DecodeOptions } from '../../../services/inference/types';

describe('resolveDecodeOptions', () => {
  it('fills in the defaults', () => {
    expect(resolveDecodeOptions()).toEqual({
      beamWidth: INFERENCE_CONFIG.BEAM_WIDTH,
      maxSteps: INFERENCE_CONFIG.MAX_STEPS,
      useLexicon: false,
      logAttention: false,
      attentionLogPath: undefined,
      specialTokens: SPECIAL_TOKENS,
      signal: undefined,
    });
  });

  it('merges partial special tokens over the defaults', () => {
    const resolved = resolveDecodeOptions({ specialTokens: { eos: 9 } });
    expect(resolved.specialTokens).toEqual({ pad: 0, unk: 1, sos: 2, eos: 9 });
  });

  it('writes the attention log to the default file when no path is given', () => {
    expect(resolveDecodeOptions({ logAttention: true }).attentionLogPath).toBe(INFERENCE_CONFIG.ATTENTION_LOG_FILE);
    expect(resolveDecodeOptions({ logAttention: true, attentionLogPath: 'out/attn.json' }).attentionLogPath).toBe('out/attn.json');
    expect(resolveDecodeOptions({ logAttention: false }).attentionLogPath).toBeUndefined();
  });

  it('turns on attention logging when a log path is given', () => {
    expect(resolveDecodeOptions({ attentionLogPath: 'out/attn.json' }).logAttention).toBe(true);
    expect(resolveDecodeOptions({ attentionLogPath: 'out/attn.json', logAttention: false }).logAttention).toBe(false);
    expect(resolveDecodeOptions({ logAttention: true }).logAttention).toBe(true);
  });

  it.each<[string, DecodeOptions]>([
    ['beamWidth', { beamWidth: 0 }],
    ['beamWidth', { beamWidth: 2.5 }],
    ['maxSteps', { maxSteps: -1 }],
    ['maxSteps', { maxSteps: Number.NaN }],
  ])('rejects an invalid %s', (name, options) => {
    expect(() => resolveDecodeOptions(options)).toThrow(ConfigurationError);
    expect(() => resolveDecodeOptions(options)).toThrow(`${name} must be a positive integer`);
  });

  it('carries the error code on configuration errors', () => {
    try {
      resolveDecodeOptions({ beamWidth: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: 'LEMMA_CONFIG_INVALID', name: 'ConfigurationError' });
    }
  });
});
