import type { Tensor } from 'onnxruntime-web';
import { ConfigurationError, ShapeError } from '../errors';
import type { DecoderState, EncoderOutput, StepInput, StepOutput } from '../types';
import { assertBatchSize, batchSize, rowSize, tileBatch } from '../utils/tensorUtils';

/** Encoder outputs replicated along the beam axis, owned by one decode call. */
export interface BatchState {
  context: Tensor;
  contextMask: Tensor;
  lexiconContext?: Tensor;
  lexiconMask?: Tensor;
  state: DecoderState;
}

export function validateEncoderOutput(encoded: EncoderOutput, numExamples: number, useLexicon: boolean): void {
  assertBatchSize(encoded.context, numExamples, 'context');
  assertBatchSize(encoded.contextMask, numExamples, 'contextMask');
  for (const [name, tensor] of Object.entries(encoded.state)) {
    assertBatchSize(tensor, numExamples, `state.${name}`);
  }
  if (useLexicon) {
    if (!encoded.lexiconContext || !encoded.lexiconMask) {
      throw new ConfigurationError('lexicon decoding requested but the scorer returned no lexicon context');
    }
    assertBatchSize(encoded.lexiconContext, numExamples, 'lexiconContext');
    assertBatchSize(encoded.lexiconMask, numExamples, 'lexiconMask');
  }
}

export function replicateBatchState(encoded: EncoderOutput, beamWidth: number, useLexicon: boolean): BatchState {
  const state: DecoderState = {};
  for (const [name, tensor] of Object.entries(encoded.state)) {
    state[name] = tileBatch(tensor, beamWidth, `state.${name}`);
  }
  return {
    context: tileBatch(encoded.context, beamWidth, 'context'),
    contextMask: tileBatch(encoded.contextMask, beamWidth, 'contextMask'),
    lexiconContext: useLexicon && encoded.lexiconContext
      ? tileBatch(encoded.lexiconContext, beamWidth, 'lexiconContext')
      : undefined,
    lexiconMask: useLexicon && encoded.lexiconMask
      ? tileBatch(encoded.lexiconMask, beamWidth, 'lexiconMask')
      : undefined,
    state,
  };
}

export function stepInput(batch: BatchState, tokens: Tensor): StepInput {
  const input: StepInput = {
    tokens,
    state: batch.state,
    context: batch.context,
    contextMask: batch.contextMask,
  };
  if (batch.lexiconContext && batch.lexiconMask) {
    input.lexiconContext = batch.lexiconContext;
    input.lexiconMask = batch.lexiconMask;
  }
  return input;
}

/** Checks one Scorer step against the `rows` decoder rows that were fed in. */
export function checkStepOutput(output: StepOutput, rows: number, tag: string): void {
  const { logProbs } = output;
  if (logProbs.dims.length !== 2 || batchSize(logProbs) !== rows) {
    throw new ShapeError(`${tag}: expected log-probabilities [${rows}, V], got [${logProbs.dims.join(', ')}]`);
  }
  if (rowSize(logProbs) === 0) {
    throw new ShapeError(`${tag}: scorer returned an empty vocabulary`);
  }
  for (const [name, tensor] of Object.entries(output.state)) {
    if (batchSize(tensor) !== rows) {
      throw new ShapeError(`${tag}: state.${name} has ${batchSize(tensor)} rows, expected ${rows}`);
    }
  }
}
