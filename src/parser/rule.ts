import { RULE_OPERATOR, TERMINATOR } from '../types/index.js';
import type { Atom, Diagnostic, Rule } from '../types/index.js';
import { parseAtom } from './predicate.js';
import { findMatchingParen, splitTopLevel } from './splitter.js';

export type RuleStructure =
    | { ok: true; rule: Rule; diagnostics: Diagnostic[] }
    | { ok: false; diagnostics: Diagnostic[] };

/**
 * Strip one pair of parentheses, only when they wrap the whole text.
 */
export function unwrapEnclosingParens(text: string): string {
    if (text.startsWith('(') && findMatchingParen(text, 0) === text.length - 1) {
        return text.slice(1, -1).trim();
    }
    return text;
}

/**
 * Turn the accumulated text of one rule into a head and an ordered body.
 *
 * Body calls that fail to parse are skipped with a diagnostic; a rule left
 * without any body call is discarded.
 */
export function structureRule(text: string, line: number = 1): RuleStructure {
    const source = text.trim();
    const operator = source.indexOf(RULE_OPERATOR);
    if (operator === -1) {
        return {
            ok: false,
            diagnostics: [{ kind: 'MalformedLine', line, text: source, message: `Missing rule operator '${RULE_OPERATOR}'` }],
        };
    }

    const head = parseAtom(source.slice(0, operator));
    if (!head.ok) {
        return {
            ok: false,
            diagnostics: [{ kind: 'MalformedLine', line, text: source, message: `Invalid rule head: ${head.reason}` }],
        };
    }

    let bodyText = source.slice(operator + RULE_OPERATOR.length).trim();
    if (bodyText.endsWith(TERMINATOR)) {
        bodyText = bodyText.slice(0, -1).trim();
    }

    const diagnostics: Diagnostic[] = [];
    const body: Atom[] = [];

    for (const segment of splitTopLevel(unwrapEnclosingParens(bodyText))) {
        const call = parseAtom(segment);
        if (call.ok) {
            body.push(call.atom);
        } else {
            diagnostics.push({
                kind: 'MalformedBodyCall',
                line,
                text: segment,
                message: `Skipping invalid body call: ${call.reason}`,
            });
        }
    }

    if (body.length === 0) {
        diagnostics.push({
            kind: 'EmptyRuleBody',
            line,
            text: source,
            message: 'Rule has no valid body calls and can never fire',
        });
        return { ok: false, diagnostics };
    }

    return { ok: true, rule: { head: head.atom, body, source, line }, diagnostics };
}
