import { UNKNOWN_VALUE } from '../../types/index.js';
import type { Atom, Term, Tuple } from '../../types/index.js';
import { ANONYMOUS_VARIABLE } from '../../parser/index.js';

/** Variable name → bound value, valid for one candidate combination. */
export type Binding = ReadonlyMap<string, string>;

export const EMPTY_BINDING: Binding = new Map();

export function isBindable(term: Term): term is { kind: 'variable'; name: string } {
    return term.kind === 'variable' && term.name !== ANONYMOUS_VARIABLE;
}

/**
 * Match a body call against one fact tuple, extending `binding`.
 *
 * Constants must equal the fact value; a bound variable must agree with
 * its earlier value. Returns null on any mismatch (arity included).
 * The input binding is never mutated.
 */
export function matchAtom(atom: Atom, tuple: Tuple, binding: Binding): Binding | null {
    if (atom.args.length !== tuple.length) return null;

    let extended: Map<string, string> | null = null;

    for (let i = 0; i < atom.args.length; i++) {
        const term = atom.args[i];
        const value = tuple[i];

        if (term.kind === 'constant') {
            if (term.value !== value) return null;
            continue;
        }
        if (!isBindable(term)) continue;

        const existing = (extended ?? binding).get(term.name);
        if (existing === undefined) {
            extended ??= new Map(binding);
            extended.set(term.name, value);
        } else if (existing !== value) {
            return null;
        }
    }

    return extended ?? binding;
}

/**
 * Build the head's value tuple; unbound variables become UNKNOWN_VALUE.
 */
export function instantiateHead(head: Atom, binding: Binding): Tuple {
    return head.args.map(term =>
        term.kind === 'constant'
            ? term.value
            : binding.get(term.name) ?? UNKNOWN_VALUE
    );
}
