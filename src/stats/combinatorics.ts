import { ValidationError } from "../errors";

// Headroom below Number.MAX_VALUE (~2^1024) when converting bigint ratios.
const SAFE_BITS = 1000;

const factorial = (n: number): bigint => {
  let result = 1n;
  for (let k = 2n; k <= BigInt(n); k += 1n) {
    result *= k;
  }
  return result;
};

/** Unrooted bifurcating topologies on n labelled leaves: (2n-5)! / (2^(n-3) (n-3)!). */
export const unrootedTopologies = (n: number): bigint => {
  if (n < 3) return 1n;
  return factorial(2 * n - 5) / (2n ** BigInt(n - 3) * factorial(n - 3));
};

/** Rooted bifurcating topologies on n labelled leaves: (2n-3)! / (2^(n-2) (n-2)!). */
export const rootedTopologies = (n: number): bigint => {
  if (n < 2) return 1n;
  return factorial(2 * n - 3) / (2n ** BigInt(n - 2) * factorial(n - 2));
};

export const topologies = (n: number, rooted: boolean): bigint =>
  rooted ? rootedTopologies(n) : unrootedTopologies(n);

const bitLength = (value: bigint): number => (value === 0n ? 0 : value.toString(2).length);

export const bigRatio = (numerator: bigint, denominator: bigint): number => {
  const excess = Math.max(bitLength(numerator), bitLength(denominator)) - SAFE_BITS;
  if (excess <= 0) return Number(numerator) / Number(denominator);
  const shift = BigInt(excess);
  return Number(numerator >> shift) / Number(denominator >> shift);
};

/**
 * Probability that `cladeSize` given taxa form a clade in a tree drawn
 * uniformly from all topologies on `totalTaxa` leaves. The clade is collapsed
 * into one leaf for the outer count; its inside is always counted rooted.
 */
export const computePrior = (totalTaxa: number, cladeSize: number, rooted: boolean): number => {
  if (!Number.isInteger(totalTaxa) || !Number.isInteger(cladeSize) || cladeSize < 1 || cladeSize > totalTaxa) {
    throw new ValidationError("DegeneratePrior", `Cannot compute a prior for ${cladeSize} of ${totalTaxa} taxa`);
  }
  const numerator = topologies(totalTaxa - cladeSize + 1, rooted) * rootedTopologies(cladeSize);
  const denominator = topologies(totalTaxa, rooted);
  const prior = bigRatio(numerator, denominator);
  if (!(prior > 0 && prior < 1)) {
    throw new ValidationError(
      "DegeneratePrior",
      `Prior for ${cladeSize} of ${totalTaxa} taxa (${rooted ? "rooted" : "unrooted"}) is ${prior}; the test is meaningless`
    );
  }
  return prior;
};
