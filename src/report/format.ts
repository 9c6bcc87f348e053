import type { MonophylyStatistics } from "../types/monophyly";

/** Scientific notation with a two-digit exponent, e.g. 1.68e-01. */
const formatExponential = (value: number): string =>
  value.toExponential(2).replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);

export const formatReport = (statistics: MonophylyStatistics): string => {
  const lines = [
    `Total trees read: ${statistics.totalTrees}`,
    `Trees after burnin: ${statistics.retainedTrees}`,
    `Monophyletic trees found: ${statistics.monophyleticCount}`,
    `Monophyletic trees expected: ${statistics.expectedMonophyleticCount}`,
    "(in the case of noninformative data)",
    "",
    `Prior: ${statistics.prior.toFixed(4)}`,
    `Posterior: ${statistics.posterior.toFixed(4)}`,
    `Bayes factor: ${statistics.bayesFactor.toFixed(4)}`,
  ];
  if (statistics.chanceProbability !== null) {
    lines.push(`Probability of this by chance alone given prior: ${formatExponential(statistics.chanceProbability)}`);
  }
  return lines.join("\n");
};
