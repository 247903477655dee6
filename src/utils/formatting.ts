/**
 * Formatting utilities
 */
import { RULE_OPERATOR, TERMINATOR } from '../types/index.js';
import type { Atom, DerivedFact, Diagnostic, Fact, Term } from '../types/index.js';

function formatTerm(term: Term): string {
    return term.kind === 'constant' ? term.value : term.name;
}

export function formatAtom(atom: Atom): string {
    return `${atom.predicate}(${atom.args.map(formatTerm).join(', ')})`;
}

/**
 * Format a fact as a statement that parses back to the same fact
 */
export function formatFact(fact: Pick<Fact, 'predicate' | 'values'>): string {
    return `${fact.predicate}(${fact.values.join(', ')})${TERMINATOR}`;
}

export function formatRule(rule: { head: Atom; body: readonly Atom[] }): string {
    return `${formatAtom(rule.head)} ${RULE_OPERATOR} ${rule.body.map(formatAtom).join(', ')}${TERMINATOR}`;
}

/**
 * Format a derived fact as a human-readable line (no terminator)
 */
export function formatDerivedFact(fact: DerivedFact): string {
    return `${fact.predicate}(${fact.values.join(', ')})`;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
    return `Line ${diagnostic.line} [${diagnostic.kind}]: ${diagnostic.message} -> ${diagnostic.text}`;
}
