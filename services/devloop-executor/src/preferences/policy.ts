import type { PreferenceFact } from './types';

export interface PartitionedFacts {
  /** Applied without asking */
  applied: PreferenceFact[];
  /** Presented to the user for confirmation during intake */
  needsConfirmation: PreferenceFact[];
}

/**
 * Confirmation policy: facts at or above the threshold are applied automatically
 */
export function partitionByConfidence(facts: readonly PreferenceFact[], threshold: number): PartitionedFacts {
  const applied: PreferenceFact[] = [];
  const needsConfirmation: PreferenceFact[] = [];
  for (const fact of facts) {
    (fact.confidence >= threshold ? applied : needsConfirmation).push(fact);
  }
  return { applied, needsConfirmation };
}

export function describeFacts(facts: readonly PreferenceFact[]): string {
  return facts.map((fact) => `${fact.key}=${fact.value}`).join(', ');
}
