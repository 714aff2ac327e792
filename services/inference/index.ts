export { Seq2SeqPredictor } from './Seq2SeqPredictor';
export { OnnxScorer, DEFAULT_ONNX_SCORER_CONFIG } from './OnnxScorer';
export type { OnnxScorerConfig, SessionLike } from './OnnxScorer';
export { BeamSearchDecoder } from './decoding/BeamSearchDecoder';
export type { BeamSearchResult } from './decoding/BeamSearchDecoder';
export { GreedyDecoder } from './decoding/GreedyDecoder';
export { Beam } from './decoding/Beam';
export { reorderHiddenState } from './decoding/HiddenStateReorderer';
export { extractHypotheses, pruneHypothesis } from './decoding/HypothesisExtractor';
export { applyLexiconDropout } from './lexiconDropout';
export { writeAttentionLog } from './attentionLog';
export type { AttentionLog } from './attentionLog';
export { INFERENCE_CONFIG, SPECIAL_TOKENS, resolveDecodeOptions } from './config';
export * from './errors';
export { setDebugLogging } from './utils/debugUtils';
export type * from './types';
