import { Person, Factors } from '../types.js';

export function personWeight(person: Person, factors: Factors): number {
  return (
    1.0 +
    factors.unproposedFactor * person.timesUnproposed +
    factors.rejectedFactor * person.timesRejected
  );
}

export interface PersonOdds {
  person: Person;
  weight: number;
  probability: number;
}

// Weight and share of the total for each person, in input order
export function selectionOdds(persons: Person[], factors: Factors): PersonOdds[] {
  const weights = persons.map((p) => personWeight(p, factors));
  const total = weights.reduce((a, b) => a + b, 0);
  return persons.map((person, i) => ({
    person,
    weight: weights[i],
    probability: weights[i] / total,
  }));
}
