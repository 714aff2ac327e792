import { readFile } from 'fs/promises';
import { InferenceSession, Tensor, env } from 'onnxruntime-web';
import { INFERENCE_CONFIG } from './config';
import { ShapeError } from './errors';
import type { DecoderState, EncoderInput, EncoderOutput, Scorer, StepInput, StepOutput } from './types';
import { logDebug } from './utils/debugUtils';
import { floatData, logSoftmax } from './utils/tensorUtils';

/** The slice of an ONNX Runtime session the scorer talks to. */
export interface SessionLike {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: Record<string, Tensor>): Promise<Readonly<Record<string, Tensor>>>;
}

export interface OnnxScorerConfig {
  encoderModelPath: string;
  decoderModelPath: string;

  // Encoder graph
  srcInputName: string;
  srcMaskInputName: string;
  posInputName: string;
  featsInputName: string;
  lexiconInputName: string;
  lexiconMaskInputName: string;
  contextOutputName: string;
  lexiconContextOutputName: string;
  editLogitsOutputName: string;

  /** Recurrent state: encoder outputs, decoder inputs. */
  stateNames: string[];
  /** Decoder outputs the next state as `${prefix}${name}`. */
  nextStatePrefix: string;

  // Decoder step graph
  tokensInputName: string;
  contextInputName: string;
  contextMaskInputName: string;
  lexiconContextInputName: string;
  lexiconDecoderMaskInputName: string;
  scoresOutputName: string;
  attentionOutputName: string;
  lexiconAttentionOutputName: string;
  /** The decoder emits raw logits rather than log-probabilities. */
  outputsLogits: boolean;

  executionProviders: string[];
  numThreads?: number;
}

export const DEFAULT_ONNX_SCORER_CONFIG: OnnxScorerConfig = {
  encoderModelPath: 'models/encoder.onnx',
  decoderModelPath: 'models/decoder_step.onnx',

  srcInputName: 'src',
  srcMaskInputName: 'src_mask',
  posInputName: 'pos',
  featsInputName: 'feats',
  lexiconInputName: 'lem',
  lexiconMaskInputName: 'lem_mask',
  contextOutputName: 'h_in',
  lexiconContextOutputName: 'h_in_lem',
  editLogitsOutputName: 'edit_logits',

  stateNames: ['hn', 'cn'],
  nextStatePrefix: 'next_',

  tokensInputName: 'dec_inputs',
  contextInputName: 'h_in',
  contextMaskInputName: 'src_mask',
  lexiconContextInputName: 'h_in_lem',
  lexiconDecoderMaskInputName: 'lem_mask',
  scoresOutputName: 'log_probs',
  attentionOutputName: 'attn',
  lexiconAttentionOutputName: 'lem_attn',
  outputsLogits: false,

  executionProviders: [INFERENCE_CONFIG.DEFAULT_PROVIDER],
};

function required(results: Readonly<Record<string, Tensor>>, name: string, graph: string): Tensor {
  const tensor = results[name];
  if (!tensor) {
    throw new ShapeError(`OnnxScorer: ${graph} produced no output named "${name}"`);
  }
  return tensor;
}

// Step graphs often keep a length-1 time axis: [rows, 1, X] -> [rows, X]
function dropTimeAxis(tensor: Tensor, name: string): Tensor {
  if (tensor.dims.length === 3 && tensor.dims[1] === 1) {
    return new Tensor('float32', floatData(tensor, name), [tensor.dims[0], tensor.dims[2]]);
  }
  return tensor;
}

/**
 * A Scorer backed by two ONNX graphs: an encoder run once per batch and a
 * single-step attention decoder run once per decode step.
 */
export class OnnxScorer implements Scorer {
  constructor(
    private encoder: SessionLike,
    private decoder: SessionLike,
    private config: OnnxScorerConfig = DEFAULT_ONNX_SCORER_CONFIG,
  ) { }

  static async create(overrides: Partial<OnnxScorerConfig> = {}): Promise<OnnxScorer> {
    const config = { ...DEFAULT_ONNX_SCORER_CONFIG, ...overrides };
    if (config.numThreads !== undefined) {
      env.wasm.numThreads = config.numThreads;
    }

    const options: InferenceSession.SessionOptions = {
      executionProviders: config.executionProviders,
      graphOptimizationLevel: 'all',
    };

    try {
      console.log(`[OnnxScorer] Loading encoder ${config.encoderModelPath} and decoder ${config.decoderModelPath}...`);
      const [encoderData, decoderData] = await Promise.all([
        readFile(config.encoderModelPath),
        readFile(config.decoderModelPath),
      ]);
      const [encoder, decoder] = await Promise.all([
        InferenceSession.create(new Uint8Array(encoderData), options),
        InferenceSession.create(new Uint8Array(decoderData), options),
      ]);
      console.log(`[OnnxScorer] Sessions ready (${config.executionProviders.join(', ')})`);
      return new OnnxScorer(encoder, decoder, config);
    } catch (e) {
      console.error('[OnnxScorer] Failed to load models:', e);
      throw e;
    }
  }

  async encode(input: EncoderInput): Promise<EncoderOutput> {
    const cfg = this.config;
    const feeds: Record<string, Tensor> = {
      [cfg.srcInputName]: input.src,
      [cfg.srcMaskInputName]: input.srcMask,
    };
    const optional: [string, Tensor | undefined][] = [
      [cfg.posInputName, input.pos],
      [cfg.featsInputName, input.feats],
      [cfg.lexiconInputName, input.lexicon],
      [cfg.lexiconMaskInputName, input.lexiconMask],
    ];
    for (const [name, tensor] of optional) {
      if (tensor && this.encoder.inputNames.includes(name)) feeds[name] = tensor;
    }

    const results = await this.encoder.run(feeds);

    const state: DecoderState = {};
    for (const name of cfg.stateNames) {
      state[name] = required(results, name, 'encoder');
    }

    const output: EncoderOutput = {
      context: required(results, cfg.contextOutputName, 'encoder'),
      contextMask: input.srcMask,
      state,
    };
    if (input.lexicon && input.lexiconMask) {
      output.lexiconContext = required(results, cfg.lexiconContextOutputName, 'encoder');
      output.lexiconMask = input.lexiconMask;
    }
    if (cfg.editLogitsOutputName in results) {
      output.editLogits = results[cfg.editLogitsOutputName];
    }
    return output;
  }

  async step(input: StepInput): Promise<StepOutput> {
    const cfg = this.config;
    const feeds: Record<string, Tensor> = {
      [cfg.tokensInputName]: input.tokens,
      [cfg.contextInputName]: input.context,
      [cfg.contextMaskInputName]: input.contextMask,
    };
    for (const name of cfg.stateNames) {
      feeds[name] = input.state[name];
    }
    if (input.lexiconContext && input.lexiconMask) {
      feeds[cfg.lexiconContextInputName] = input.lexiconContext;
      feeds[cfg.lexiconDecoderMaskInputName] = input.lexiconMask;
    }

    const results = await this.decoder.run(feeds);

    const scores = dropTimeAxis(required(results, cfg.scoresOutputName, 'decoder'), cfg.scoresOutputName);
    const state: DecoderState = {};
    for (const name of cfg.stateNames) {
      state[name] = required(results, `${cfg.nextStatePrefix}${name}`, 'decoder');
    }

    const attention: Tensor[] = [];
    for (const name of [cfg.attentionOutputName, cfg.lexiconAttentionOutputName]) {
      if (name in results) attention.push(dropTimeAxis(results[name], name));
    }
    logDebug(`[OnnxScorer] step: ${input.tokens.dims[0]} rows, vocab ${scores.dims[1]}`);

    return {
      logProbs: cfg.outputsLogits ? logSoftmax(scores) : scores,
      state,
      attention: attention.length > 0 ? attention : undefined,
    };
  }
}
