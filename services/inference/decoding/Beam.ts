import { ShapeError } from '../errors';
import type { SpecialTokens } from '../types';

interface Candidate {
  score: number;
  /** Flat index `origin * vocabSize + token`. */
  index: number;
}

// NaN ranks with -Infinity.
function rankScore(score: number): number {
  return Number.isNaN(score) ? -Infinity : score;
}

// Higher score first; equal scores keep the lower flat index.
function compareCandidates(a: Candidate, b: Candidate): number {
  const sa = rankScore(a.score);
  const sb = rankScore(b.score);
  if (sa !== sb) return sb > sa ? 1 : -1;
  return a.index - b.index;
}

export interface SortedBeam {
  scores: number[];
  indices: number[];
}

/**
 * Search state for one example: K live candidates, the token each one chose
 * at every step, and where each one came from.
 */
export class Beam {
  private scores: number[];
  private readonly tokens: number[][];
  private readonly backpointers: number[][];
  private done = false;

  constructor(
    readonly width: number,
    private readonly specialTokens: Pick<SpecialTokens, 'sos' | 'eos' | 'pad'>,
    private readonly maxLength = Infinity,
  ) {
    // Only slot 0 is a real start state; the rest can never win step 0.
    this.scores = Array.from({ length: width }, (_, i) => (i === 0 ? 0 : -Infinity));
    this.tokens = [Array.from({ length: width }, (_, i) => (i === 0 ? specialTokens.sos : specialTokens.pad))];
    this.backpointers = [Array.from({ length: width }, (_, i) => i)];
  }

  get isDone(): boolean {
    return this.done;
  }

  /** Number of advances recorded so far. */
  get length(): number {
    return this.tokens.length - 1;
  }

  getScores(): readonly number[] {
    return this.scores;
  }

  getCurrentState(): readonly number[] {
    return this.tokens[this.tokens.length - 1];
  }

  getCurrentOrigin(): readonly number[] {
    return this.backpointers[this.backpointers.length - 1];
  }

  /**
   * Extends every candidate by every token, keeps the best `width`, and
   * reports whether the best candidate has finished.
   *
   * @param stepLogProbs one row of next-token log-probabilities per slot
   */
  advance(stepLogProbs: readonly ArrayLike<number>[]): boolean {
    if (this.done) return true;

    if (stepLogProbs.length !== this.width) {
      throw new ShapeError(`Beam: expected ${this.width} rows of log-probabilities, got ${stepLogProbs.length}`);
    }
    const vocabSize = stepLogProbs[0].length;
    for (const row of stepLogProbs) {
      if (row.length !== vocabSize) {
        throw new ShapeError(`Beam: log-probability rows differ in length (${row.length} vs ${vocabSize})`);
      }
    }

    const firstStep = this.length === 0;
    const expandable = firstStep ? 1 : this.width;
    if (expandable * vocabSize < this.width) {
      throw new ShapeError(`Beam: vocabulary of ${vocabSize} cannot fill a beam of ${this.width}`);
    }

    // Keep a small sorted list of the best candidates seen so far.
    const top: Candidate[] = [];
    for (let origin = 0; origin < expandable; origin++) {
      const row = stepLogProbs[origin];
      const base = this.scores[origin];
      for (let token = 0; token < vocabSize; token++) {
        const candidate = { score: base + row[token], index: origin * vocabSize + token };
        if (top.length < this.width) {
          top.push(candidate);
          top.sort(compareCandidates);
        } else if (compareCandidates(candidate, top[top.length - 1]) < 0) {
          top[top.length - 1] = candidate;
          top.sort(compareCandidates);
        }
      }
    }

    this.scores = top.map((c) => c.score);
    this.backpointers.push(top.map((c) => Math.floor(c.index / vocabSize)));
    this.tokens.push(top.map((c) => c.index % vocabSize));

    if (this.tokens[this.tokens.length - 1][0] === this.specialTokens.eos || this.length >= this.maxLength) {
      this.done = true;
    }
    return this.done;
  }

  sortBest(): SortedBeam {
    const order = this.scores
      .map((score, index) => ({ score, index }))
      .sort(compareCandidates);
    return {
      scores: order.map((c) => c.score),
      indices: order.map((c) => c.index),
    };
  }

  /** Walks the backpointers from `slot` at the last step back to the start. */
  getHyp(slot: number): number[] {
    const hyp: number[] = [];
    let k = slot;
    for (let step = this.tokens.length - 1; step > 0; step--) {
      hyp.push(this.tokens[step][k]);
      k = this.backpointers[step][k];
    }
    return hyp.reverse();
  }
}
