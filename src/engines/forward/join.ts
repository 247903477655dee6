/**
 * Body joins: produce every consistent binding for a rule body.
 *
 * `indexedJoin` is the default. `naiveJoin` enumerates the full cross
 * product and is kept as the reference the indexed join is tested against.
 */

import type { Atom, Tuple } from '../../types/index.js';
import type { JoinStrategy } from '../../types/options.js';
import { FactStore, tupleKey } from './factStore.js';
import { EMPTY_BINDING, isBindable, matchAtom } from './unify.js';
import type { Binding } from './unify.js';

/**
 * Nested-loop join over the Cartesian product of the candidate tuples.
 */
export function* naiveJoin(body: readonly Atom[], store: FactStore): Generator<Binding> {
    const candidates = body.map(call => store.lookup(call.predicate));
    if (candidates.length === 0 || candidates.some(c => c.length === 0)) return;

    const choice: number[] = candidates.map(() => 0);

    while (true) {
        let binding: Binding | null = EMPTY_BINDING;
        for (let i = 0; i < body.length && binding; i++) {
            binding = matchAtom(body[i], candidates[i][choice[i]], binding);
        }
        if (binding) yield binding;

        // Advance the odometer, rightmost call first
        let k = choice.length - 1;
        while (k >= 0) {
            choice[k]++;
            if (choice[k] < candidates[k].length) break;
            choice[k] = 0;
            k--;
        }
        if (k < 0) return;
    }
}

/**
 * Left-to-right hash join.
 *
 * For each call, the positions holding a constant or a variable bound by an
 * earlier call are known before any fact is read; candidates are looked up in
 * the store's index on those positions rather than scanned.
 */
export function indexedJoin(body: readonly Atom[], store: FactStore): Binding[] {
    if (body.length === 0) return [];

    let partial: Binding[] = [EMPTY_BINDING];
    const bound = new Set<string>();

    for (const call of body) {
        const keyPositions: number[] = [];
        call.args.forEach((term, i) => {
            if (term.kind === 'constant' || (isBindable(term) && bound.has(term.name))) {
                keyPositions.push(i);
            }
        });

        const index = keyPositions.length > 0 ? store.index(call.predicate, keyPositions) : null;
        const next: Binding[] = [];

        for (const binding of partial) {
            const candidates = index
                ? lookupCandidates(index, call, keyPositions, binding)
                : store.lookup(call.predicate);

            for (const tuple of candidates) {
                const extended = matchAtom(call, tuple, binding);
                if (extended) next.push(extended);
            }
        }

        partial = next;
        if (partial.length === 0) return [];

        for (const term of call.args) {
            if (isBindable(term)) bound.add(term.name);
        }
    }

    return partial;
}

function lookupCandidates(
    index: ReadonlyMap<string, readonly Tuple[]>,
    call: Atom,
    positions: readonly number[],
    binding: Binding
): readonly Tuple[] {
    const values: string[] = [];
    for (const i of positions) {
        const term = call.args[i];
        const value = term.kind === 'constant' ? term.value : binding.get(term.name);
        if (value === undefined) return [];
        values.push(value);
    }
    return index.get(tupleKey(values)) ?? [];
}

export function joinBody(body: readonly Atom[], store: FactStore, strategy: JoinStrategy): Iterable<Binding> {
    return strategy === 'naive' ? naiveJoin(body, store) : indexedJoin(body, store);
}
