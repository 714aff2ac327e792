import { idRows, writeAttentionLog } from './attentionLog';
import { resolveDecodeOptions } from './config';
import { BeamSearchDecoder } from './decoding/BeamSearchDecoder';
import { GreedyDecoder } from './decoding/GreedyDecoder';
import { extractHypotheses } from './decoding/HypothesisExtractor';
import { ConfigurationError } from './errors';
import type {
  AttentionStep,
  DecodeOptions,
  EncoderInput,
  Hypothesis,
  PredictionResult,
  ResolvedDecodeOptions,
  Scorer,
} from './types';
import { logDebug } from './utils/debugUtils';
import { PredictionQueue } from './utils/PredictionQueue';
import { assertBatchSize, batchSize } from './utils/tensorUtils';

/**
 * Turns encoded source tokens into lemmas: encode once, then beam search
 * (or greedy decoding at width 1), then read back the best hypothesis per
 * example. Calls are run one at a time against the Scorer.
 */
export class Seq2SeqPredictor {
  private queue = new PredictionQueue();
  private beamSearch: BeamSearchDecoder;
  private greedy: GreedyDecoder;

  constructor(private scorer: Scorer) {
    this.beamSearch = new BeamSearchDecoder(scorer);
    this.greedy = new GreedyDecoder(scorer);
  }

  public async predict(input: EncoderInput, options: DecodeOptions = {}): Promise<PredictionResult> {
    const resolved = resolveDecodeOptions(options);
    if (resolved.useLexicon && (!input.lexicon || !input.lexiconMask)) {
      throw new ConfigurationError('useLexicon requires lexicon and lexiconMask inputs');
    }

    const numExamples = batchSize(input.src);
    assertBatchSize(input.srcMask, numExamples, 'srcMask');
    assertBatchSize(input.pos, numExamples, 'pos');
    assertBatchSize(input.feats, numExamples, 'feats');
    assertBatchSize(input.lexicon, numExamples, 'lexicon');
    assertBatchSize(input.lexiconMask, numExamples, 'lexiconMask');

    return this.queue.enqueue(() => this.run(input, resolved, numExamples));
  }

  private async run(input: EncoderInput, options: ResolvedDecodeOptions, numExamples: number): Promise<PredictionResult> {
    const encoded = await this.scorer.encode(input);

    let hypotheses: Hypothesis[];
    let steps: number;
    let attention: AttentionStep[] | undefined;

    if (options.beamWidth === 1) {
      ({ hypotheses, steps, attention } = await this.greedy.decode(encoded, numExamples, options));
    } else {
      const result = await this.beamSearch.decode(encoded, numExamples, options);
      hypotheses = extractHypotheses(result.beams, options.specialTokens);
      steps = result.steps;
      attention = result.attention;
    }

    logDebug(`[Seq2SeqPredictor] Decoded ${numExamples} examples in ${steps} steps (beam ${options.beamWidth})`);

    if (options.attentionLogPath && attention) {
      await writeAttentionLog(options.attentionLogPath, {
        src: idRows(input.src),
        lexicon: input.lexicon ? idRows(input.lexicon) : undefined,
        attention,
        hypotheses: hypotheses.map((h) => h.tokens),
      });
    }

    return {
      hypotheses: hypotheses.map((h) => h.tokens),
      scores: hypotheses.map((h) => h.score),
      steps,
      editLogits: encoded.editLogits,
      attention,
    };
  }

  public dispose(): void {
    this.queue.dispose();
  }
}
