import type { DerivedFact, Tuple } from '../../types/index.js';

function factKey(predicate: string, values: Tuple): string {
    return JSON.stringify([predicate, ...values]);
}

/**
 * Derived facts deduplicated on (predicate, ordered values).
 * Iterates in first-derivation order.
 */
export class DerivedFactSet implements Iterable<DerivedFact> {
    private readonly facts = new Map<string, DerivedFact>();

    /** Returns true if the fact was not already present. */
    add(fact: DerivedFact): boolean {
        const key = factKey(fact.predicate, fact.values);
        if (this.facts.has(key)) return false;
        this.facts.set(key, fact);
        return true;
    }

    has(predicate: string, values: Tuple): boolean {
        return this.facts.has(factKey(predicate, values));
    }

    get size(): number {
        return this.facts.size;
    }

    [Symbol.iterator](): Iterator<DerivedFact> {
        return this.facts.values();
    }

    toArray(): DerivedFact[] {
        return [...this.facts.values()];
    }
}
