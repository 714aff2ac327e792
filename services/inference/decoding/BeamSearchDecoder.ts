import { Tensor } from 'onnxruntime-web';
import { attentionStep } from '../attentionLog';
import { AbortError } from '../errors';
import type { AttentionStep, EncoderOutput, ResolvedDecodeOptions, Scorer } from '../types';
import { logDebug } from '../utils/debugUtils';
import { rowView } from '../utils/tensorUtils';
import { Beam } from './Beam';
import { checkStepOutput, replicateBatchState, stepInput, validateEncoderOutput } from './batchState';
import { reorderHiddenState } from './HiddenStateReorderer';

export interface BeamSearchResult {
  beams: Beam[];
  /** Scorer steps taken. */
  steps: number;
  attention?: AttentionStep[];
}

export class BeamSearchDecoder {
  constructor(private scorer: Scorer) { }

  async decode(
    encoded: EncoderOutput,
    numExamples: number,
    options: Omit<ResolvedDecodeOptions, 'attentionLogPath'>,
  ): Promise<BeamSearchResult> {
    const { beamWidth, maxSteps, useLexicon, logAttention, specialTokens, signal } = options;

    validateEncoderOutput(encoded, numExamples, useLexicon);
    if (numExamples === 0) {
      return { beams: [], steps: 0, attention: logAttention ? [] : undefined };
    }

    logDebug('[BeamSearch] Config:', { numExamples, beamWidth, maxSteps, useLexicon });

    // 1. Replicate encoder outputs K times along the beam axis
    const batch = replicateBatchState(encoded, beamWidth, useLexicon);
    const rows = beamWidth * numExamples;

    // 2. Initialize beams
    const beams = Array.from({ length: numExamples }, () => new Beam(beamWidth, specialTokens, maxSteps));
    const attention: AttentionStep[] = [];
    let steps = 0;

    for (let step = 0; step < maxSteps; step++) {
      if (signal?.aborted) throw new AbortError();

      // Beam-major decoder inputs: row k * N + b is slot k of example b
      const inputArray = new Int32Array(rows);
      beams.forEach((beam, b) => {
        beam.getCurrentState().forEach((token, k) => {
          inputArray[k * numExamples + b] = token;
        });
      });
      const tokens = new Tensor('int32', inputArray, [rows, 1]);

      const output = await this.scorer.step(stepInput(batch, tokens));
      steps++;

      checkStepOutput(output, rows, 'BeamSearch');
      const { logProbs } = output;
      batch.state = output.state;

      if (logAttention && output.attention) {
        attention.push(attentionStep(output.attention, numExamples));
      }

      // 3. Advance each beam, then move its carried state to follow the survivors
      beams.forEach((beam, b) => {
        if (beam.isDone) return;
        const slotRows = Array.from({ length: beamWidth }, (_, k) => rowView(logProbs, k * numExamples + b, 'logProbs'));
        beam.advance(slotRows);
        reorderHiddenState(batch.state, b, beam.getCurrentOrigin(), beamWidth);
      });

      if (beams.every((beam) => beam.isDone)) {
        logDebug(`[BeamSearch] All beams finished after ${steps} steps`);
        break;
      }
    }

    return {
      beams,
      steps,
      attention: logAttention ? attention : undefined,
    };
  }
}
