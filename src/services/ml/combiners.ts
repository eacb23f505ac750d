import { CombinerName } from '../../types/models';

/**
 * Folds a list of per-token probabilities for one category into a single
 * score. `neutral` is the score of a category with no evidence.
 */
export interface ProbabilityCombiner {
  readonly name: CombinerName;
  readonly neutral: number;
  combine(probabilities: number[]): number;
}

/**
 * Survival function of the chi-squared distribution, closed form for an
 * even number of degrees of freedom
 */
export function chiSquareSurvival(chi: number, degreesOfFreedom: number): number {
  const m = chi / 2;
  let term = Math.exp(-m);
  let sum = term;

  for (let i = 1; i < degreesOfFreedom / 2; i++) {
    term *= m / i;
    sum += term;
  }

  return Math.min(sum, 1);
}

/**
 * Gary Robinson's inverse chi-squared combination of Fisher's method
 */
export class RobinsonFisherCombiner implements ProbabilityCombiner {
  readonly name = 'robinson-fisher' as const;
  readonly neutral = 0.5;

  combine(probabilities: number[]): number {
    const n = probabilities.length;
    if (n === 0) return this.neutral;

    let logNotP = 0;
    let logP = 0;
    for (const p of probabilities) {
      logNotP += Math.log(1 - p);
      logP += Math.log(p);
    }

    const notEvidence = chiSquareSurvival(-2 * logNotP, 2 * n);
    const evidence = chiSquareSurvival(-2 * logP, 2 * n);
    return (1 + evidence - notEvidence) / 2;
  }
}

/**
 * Graham's original product of odds
 */
export class OddsProductCombiner implements ProbabilityCombiner {
  readonly name = 'odds-product' as const;
  readonly neutral = 0;

  combine(probabilities: number[]): number {
    if (probabilities.length === 0) return this.neutral;

    let f = 1;
    let notF = 1;
    for (const p of probabilities) {
      f *= p;
      notF *= 1 - p;
    }

    return f / (f + notF);
  }
}

export function createCombiner(name: CombinerName): ProbabilityCombiner {
  switch (name) {
    case 'robinson-fisher':
      return new RobinsonFisherCombiner();
    case 'odds-product':
      return new OddsProductCombiner();
  }
}
