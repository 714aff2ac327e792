import { Tensor } from 'onnxruntime-web';
import { attentionStep } from '../attentionLog';
import { AbortError } from '../errors';
import type { AttentionStep, EncoderOutput, Hypothesis, ResolvedDecodeOptions, Scorer } from '../types';
import { logDebug } from '../utils/debugUtils';
import { argmax, rowView } from '../utils/tensorUtils';
import { checkStepOutput, replicateBatchState, stepInput, validateEncoderOutput } from './batchState';
import { pruneHypothesis } from './HypothesisExtractor';

export interface GreedyResult {
  hypotheses: Hypothesis[];
  steps: number;
  attention?: AttentionStep[];
}

/**
 * Beam width 1 without the beam bookkeeping: one row per example, argmax
 * each step, nothing to reorder.
 */
export class GreedyDecoder {
  constructor(private scorer: Scorer) { }

  async decode(
    encoded: EncoderOutput,
    numExamples: number,
    options: Omit<ResolvedDecodeOptions, 'attentionLogPath' | 'beamWidth'>,
  ): Promise<GreedyResult> {
    const { maxSteps, useLexicon, logAttention, specialTokens, signal } = options;

    validateEncoderOutput(encoded, numExamples, useLexicon);
    const batch = replicateBatchState(encoded, 1, useLexicon);

    const outputs: number[][] = Array.from({ length: numExamples }, () => []);
    const scores = new Array<number>(numExamples).fill(0);
    const done = new Array<boolean>(numExamples).fill(false);
    const attention: AttentionStep[] = [];
    let inputArray = new Int32Array(numExamples).fill(specialTokens.sos);
    let totalDone = 0;
    let steps = 0;

    while (totalDone < numExamples && steps < maxSteps) {
      if (signal?.aborted) throw new AbortError();

      const tokens = new Tensor('int32', inputArray, [numExamples, 1]);
      const output = await this.scorer.step(stepInput(batch, tokens));
      steps++;

      checkStepOutput(output, numExamples, 'Greedy');
      const { logProbs } = output;
      batch.state = output.state;

      if (logAttention && output.attention) {
        attention.push(attentionStep(output.attention, numExamples));
      }

      const preds = new Int32Array(numExamples);
      for (let b = 0; b < numExamples; b++) {
        const row = rowView(logProbs, b, 'logProbs');
        const token = argmax(row);
        preds[b] = token;
        if (done[b]) continue;

        scores[b] += row[token];
        if (token === specialTokens.eos) {
          done[b] = true;
          totalDone++;
        } else {
          outputs[b].push(token);
        }
      }
      inputArray = preds;
    }

    logDebug(`[Greedy] Finished after ${steps} steps (${totalDone}/${numExamples} reached EOS)`);

    return {
      hypotheses: outputs.map((tokens, b) => ({ tokens: pruneHypothesis(tokens, specialTokens), score: scores[b] })),
      steps,
      attention: logAttention ? attention : undefined,
    };
  }
}
