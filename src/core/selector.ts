import { Person, Factors } from '../types.js';
import { EmptyCandidateSetError } from '../errors.js';
import { personWeight } from './weight.js';

// Weighted random selection: item i owns [cumulative(i-1), cumulative(i))
export function weightedRandomSelect<T>(
  items: T[],
  weights: number[],
  random: () => number = Math.random,
): T {
  if (items.length === 0) {
    throw new Error('Cannot select from empty array');
  }
  if (items.length !== weights.length) {
    throw new Error('Items and weights must have same length');
  }

  const totalWeight = weights.reduce((a, b) => a + b, 0);

  if (!(totalWeight > 0)) {
    throw new Error('Total weight must be positive');
  }

  const r = random() * totalWeight;
  let cumulative = 0;

  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i];
    if (r < cumulative) {
      return items[i];
    }
  }

  // Rounding can leave r a hair above the last boundary
  return items[items.length - 1];
}

// Draw one person from the active candidates. Does not touch counters.
export function proposePerson(
  candidates: Person[],
  factors: Factors,
  random: () => number = Math.random,
): Person {
  if (candidates.length === 0) {
    throw new EmptyCandidateSetError();
  }
  return weightedRandomSelect(
    candidates,
    candidates.map((p) => personWeight(p, factors)),
    random,
  );
}
