import type { Tensor } from 'onnxruntime-web';

export interface SpecialTokens {
  pad: number;
  unk: number;
  sos: number;
  eos: number;
}

/**
 * Named recurrent state carried between decoder steps (hidden/cell, or
 * whatever the decoder graph exposes). Every entry is float32 with the
 * beam-major batch axis first: row `k * N + b` is slot k of example b.
 */
export type DecoderState = Record<string, Tensor>;

export interface EncoderInput {
  /** int32 [N, srcLen] */
  src: Tensor;
  /** bool [N, srcLen], true marks padding */
  srcMask: Tensor;
  /** int32 [N] */
  pos?: Tensor;
  /** int32 [N, numFeats] */
  feats?: Tensor;
  /** int32 [N, lexLen], candidate lemma from an external analyzer */
  lexicon?: Tensor;
  /** bool [N, lexLen] */
  lexiconMask?: Tensor;
}

export interface EncoderOutput {
  /** float32 [N, srcLen, H] */
  context: Tensor;
  contextMask: Tensor;
  lexiconContext?: Tensor;
  lexiconMask?: Tensor;
  state: DecoderState;
  /** float32 [N, numEdit], passed through to the caller untouched */
  editLogits?: Tensor;
}

export interface StepInput {
  /** int32 [rows, 1] */
  tokens: Tensor;
  state: DecoderState;
  context: Tensor;
  contextMask: Tensor;
  lexiconContext?: Tensor;
  lexiconMask?: Tensor;
}

export interface StepOutput {
  /** float32 [rows, V] */
  logProbs: Tensor;
  state: DecoderState;
  /** One float32 [rows, len] tensor per context: source first, then lexicon. */
  attention?: Tensor[];
}

/**
 * The neural side of the lemmatizer. `step` must return fresh tensors and
 * must not write into the ones it was given.
 */
export interface Scorer {
  encode(input: EncoderInput): Promise<EncoderOutput>;
  step(input: StepInput): Promise<StepOutput>;
}

export interface DecodeOptions {
  beamWidth?: number;
  maxSteps?: number;
  useLexicon?: boolean;
  logAttention?: boolean;
  /**
   * Where the attention log is written as JSON; implies logAttention.
   * Defaults to `INFERENCE_CONFIG.ATTENTION_LOG_FILE` when logAttention is set.
   */
  attentionLogPath?: string;
  specialTokens?: Partial<SpecialTokens>;
  signal?: AbortSignal;
}

export interface ResolvedDecodeOptions {
  beamWidth: number;
  maxSteps: number;
  useLexicon: boolean;
  logAttention: boolean;
  attentionLogPath?: string;
  specialTokens: SpecialTokens;
  signal?: AbortSignal;
}

/** Attention of each example's slot-0 row at one step. */
export interface AttentionStep {
  source: number[][];
  lexicon?: number[][];
}

export interface Hypothesis {
  tokens: number[];
  score: number;
}

export interface PredictionResult {
  hypotheses: number[][];
  scores: number[];
  /** Scorer steps taken. */
  steps: number;
  editLogits?: Tensor;
  attention?: AttentionStep[];
}
