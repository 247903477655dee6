import { TERMINATOR } from '../types/index.js';
import type { Atom, Term } from '../types/index.js';
import { findMatchingParen, splitTopLevel } from './splitter.js';

export type PredicateParse =
    | { ok: true; predicate: string; args: string[] }
    | { ok: false; reason: string };

const NAME_PATTERN = /^[^\s(),'"]+$/;
const VARIABLE_PATTERN = /^[A-Z_]/;

export const ANONYMOUS_VARIABLE = '_';

/**
 * Parse `name(arg1, arg2, ...)` with an optional trailing terminator.
 *
 * Arguments are split on top-level commas only; a nested argument such as
 * `(b,c)` or `f(x)` is kept as one opaque text. Never throws.
 */
export function parsePredicate(text: string): PredicateParse {
    let statement = text.trim();
    if (statement.endsWith(TERMINATOR)) {
        statement = statement.slice(0, -1).trimEnd();
    }

    const open = statement.indexOf('(');
    if (open === -1) {
        return { ok: false, reason: 'Missing opening parenthesis' };
    }

    const close = findMatchingParen(statement, open);
    if (close === -1) {
        return { ok: false, reason: 'Missing closing parenthesis' };
    }
    if (close !== statement.length - 1) {
        return { ok: false, reason: `Unexpected text after ')': '${statement.slice(close + 1).trim()}'` };
    }

    const predicate = statement.slice(0, open).trim();
    if (!predicate) {
        return { ok: false, reason: 'Missing predicate name' };
    }
    if (!NAME_PATTERN.test(predicate)) {
        return { ok: false, reason: `Invalid predicate name '${predicate}'` };
    }

    const args = splitTopLevel(statement.slice(open + 1, close));
    if (args.some(arg => arg === '')) {
        return { ok: false, reason: 'Empty argument in argument list' };
    }

    return { ok: true, predicate, args };
}

/**
 * Classify an argument by lexical convention: uppercase or `_` start means variable.
 */
export function classifyTerm(text: string): Term {
    return VARIABLE_PATTERN.test(text)
        ? { kind: 'variable', name: text }
        : { kind: 'constant', value: text };
}

/**
 * Parse a rule head or body call into an atom of classified terms.
 */
export function parseAtom(text: string): { ok: true; atom: Atom } | { ok: false; reason: string } {
    const parsed = parsePredicate(text);
    if (!parsed.ok) return parsed;
    return {
        ok: true,
        atom: { predicate: parsed.predicate, args: parsed.args.map(classifyTerm) },
    };
}
