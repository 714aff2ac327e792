import type { Hypothesis, SpecialTokens } from '../types';
import type { Beam } from './Beam';

/**
 * Drops everything from the first EOS on, then leading SOS/PAD and
 * trailing PAD.
 */
export function pruneHypothesis(tokens: readonly number[], specialTokens: SpecialTokens): number[] {
  const eosAt = tokens.indexOf(specialTokens.eos);
  let end = eosAt === -1 ? tokens.length : eosAt;
  let start = 0;
  while (start < end && (tokens[start] === specialTokens.sos || tokens[start] === specialTokens.pad)) start++;
  while (end > start && tokens[end - 1] === specialTokens.pad) end--;
  return tokens.slice(start, end);
}

export function extractHypotheses(beams: readonly Beam[], specialTokens: SpecialTokens): Hypothesis[] {
  return beams.map((beam) => {
    const { scores, indices } = beam.sortBest();
    return {
      tokens: pruneHypothesis(beam.getHyp(indices[0]), specialTokens),
      score: scores[0],
    };
  });
}
