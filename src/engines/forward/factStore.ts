import type { Fact, Tuple } from '../../types/index.js';

const EMPTY: readonly Tuple[] = [];

/** Serialize a value tuple into a collision-free string key. */
export function tupleKey(values: readonly string[]): string {
    return JSON.stringify(values);
}

/**
 * Parsed facts grouped by predicate name.
 *
 * Built once per run. Insertion order and duplicate tuples are kept.
 */
export class FactStore {
    private readonly tuples = new Map<string, Tuple[]>();
    private readonly indexes = new Map<string, Map<string, Tuple[]>>();

    static from(facts: Iterable<Pick<Fact, 'predicate' | 'values'>>): FactStore {
        const store = new FactStore();
        for (const fact of facts) {
            let tuples = store.tuples.get(fact.predicate);
            if (!tuples) {
                tuples = [];
                store.tuples.set(fact.predicate, tuples);
            }
            tuples.push(fact.values);
        }
        return store;
    }

    /** All tuples recorded for a predicate; empty for unknown names. */
    lookup(predicate: string): readonly Tuple[] {
        return this.tuples.get(predicate) ?? EMPTY;
    }

    /**
     * Tuples of `predicate` grouped by their values at `positions`.
     * Built on first use and cached. Tuples too short for a position are left out.
     */
    index(predicate: string, positions: readonly number[]): ReadonlyMap<string, readonly Tuple[]> {
        const cacheKey = `${predicate}/${positions.join(',')}`;
        const cached = this.indexes.get(cacheKey);
        if (cached) return cached;

        const index = new Map<string, Tuple[]>();
        const width = Math.max(-1, ...positions) + 1;

        for (const tuple of this.lookup(predicate)) {
            if (tuple.length < width) continue;
            const key = tupleKey(positions.map(i => tuple[i]));
            const bucket = index.get(key);
            if (bucket) {
                bucket.push(tuple);
            } else {
                index.set(key, [tuple]);
            }
        }

        this.indexes.set(cacheKey, index);
        return index;
    }

    get predicates(): string[] {
        return [...this.tuples.keys()];
    }

    get size(): number {
        let total = 0;
        for (const tuples of this.tuples.values()) total += tuples.length;
        return total;
    }
}
