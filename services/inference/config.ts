import { ConfigurationError } from './errors';
import type { DecodeOptions, ResolvedDecodeOptions, SpecialTokens } from './types';

export const INFERENCE_CONFIG = {
  // Generation defaults
  BEAM_WIDTH: 5,
  MAX_STEPS: 50,

  // Training-time lexicon input dropout, off at inference
  LEXICON_DROPOUT: 0,

  ATTENTION_LOG_FILE: 'log_attn.json',

  DEFAULT_PROVIDER: 'wasm',
};

export const SPECIAL_TOKENS: SpecialTokens = {
  pad: 0,
  unk: 1,
  sos: 2,
  eos: 3,
};

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

export function resolveDecodeOptions(options: DecodeOptions = {}): ResolvedDecodeOptions {
  const beamWidth = options.beamWidth ?? INFERENCE_CONFIG.BEAM_WIDTH;
  const maxSteps = options.maxSteps ?? INFERENCE_CONFIG.MAX_STEPS;
  assertPositiveInteger('beamWidth', beamWidth);
  assertPositiveInteger('maxSteps', maxSteps);

  const logAttention = options.logAttention ?? (options.attentionLogPath !== undefined);
  const attentionLogPath = options.attentionLogPath
    ?? (logAttention ? INFERENCE_CONFIG.ATTENTION_LOG_FILE : undefined);

  return {
    beamWidth,
    maxSteps,
    useLexicon: options.useLexicon ?? false,
    logAttention,
    attentionLogPath,
    specialTokens: { ...SPECIAL_TOKENS, ...options.specialTokens },
    signal: options.signal,
  };
}
