import { ValidationError } from "../errors";
import type { MonophylyStatistics } from "../types/monophyly";
import { computePrior } from "./combinatorics";

export interface EvaluationInput {
  monophyleticCount: number;
  retainedTrees: number;
  totalTrees: number;
  totalTaxa: number;
  cladeSize: number;
  rooted: boolean;
}

export const assertBurninFraction = (fraction: number): void => {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction >= 1) {
    throw new ValidationError("InvalidBurnin", `Burn-in fraction must be in [0, 1), got ${fraction}`);
  }
};

/** Drops the first floor(length * fraction) samples of one run. */
export const applyBurnin = <T>(samples: T[], fraction: number): T[] => {
  assertBurninFraction(fraction);
  return samples.slice(Math.floor(samples.length * fraction));
};

export const computePosterior = (monophyleticCount: number, total: number): number => {
  if (total <= 0) {
    throw new ValidationError("DegeneratePosterior", "No trees left to compute a posterior from");
  }
  const posterior = monophyleticCount / total;
  if (posterior === 1) {
    throw new ValidationError(
      "DegeneratePosterior",
      `All ${total} trees are monophyletic; posterior odds are infinite`
    );
  }
  return posterior;
};

export const odds = (probability: number): number => probability / (1 - probability);

export const bayesFactor = (prior: number, posterior: number): number => odds(posterior) / odds(prior);

/** Chance of seeing no monophyletic tree in `total` draws from the prior alone. */
export const chanceProbability = (prior: number, total: number): number => (1 - prior) ** total;

export const evaluateMonophyly = ({
  monophyleticCount,
  retainedTrees,
  totalTrees,
  totalTaxa,
  cladeSize,
  rooted,
}: EvaluationInput): MonophylyStatistics => {
  const prior = computePrior(totalTaxa, cladeSize, rooted);
  const posterior = computePosterior(monophyleticCount, retainedTrees);
  const factor = bayesFactor(prior, posterior);
  return {
    totalTrees,
    retainedTrees,
    monophyleticCount,
    expectedMonophyleticCount: Math.round(prior * retainedTrees),
    prior,
    posterior,
    bayesFactor: factor,
    chanceProbability: factor === 0 ? chanceProbability(prior, retainedTrees) : null,
  };
};
