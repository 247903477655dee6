/**
 * Tests for the line-level syntax validator
 */

import { SyntaxValidator, validateLogicText } from '../src/syntaxValidator.js';

describe('SyntaxValidator', () => {
    test('accepts well-formed facts and multi-line rules', () => {
        const result = validateLogicText([
            'parent(john, mary).',
            'uncle(X, Y) :-',
            '    sibling(X, Z),',
            '    parent(Z, Y).',
        ].join('\n'));

        expect(result).toEqual({ valid: true, errors: [], warnings: [], issues: [] });
    });

    test('reports missing periods and missing parentheses by line', () => {
        const result = validateLogicText([
            'parent(john, mary).',
            'parent(mary, susan)',
            'uncle(X, Y) :-',
            '    sibling(X, Z),',
            '    parent(Z, Y).',
            'Tom is a parent.',
            'Parent(a).',
        ].join('\n'));

        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
            'Line 2: Missing period at end.',
            'Line 6: Missing parentheses.',
        ]);
        expect(result.warnings).toEqual([
            "Line 7: Predicate 'Parent' starts with uppercase - predicates are conventionally lowercase",
        ]);
    });

    test('a trailing comma outside a rule is a missing period', () => {
        const result = validateLogicText([
            'parent(a, b),',
            'uncle(X, Y) :- sibling(X, Z),',
            '    parent(Z, Y).',
            'parent(c, d),',
        ].join('\n'));

        expect(result.errors).toEqual([
            'Line 1: Missing period at end.',
            'Line 4: Missing period at end.',
        ]);
    });

    test('warns about unbalanced parentheses without failing', () => {
        const result = validateLogicText('p(a, (b).');

        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(['Line 1: Unmatched opening parenthesis']);
    });

    test('warns about an unmatched closing parenthesis', () => {
        const result = validateLogicText('p(a)).');
        expect(result.warnings).toEqual(['Line 1: Unmatched closing parenthesis at position 4']);
    });

    test('warns about empty argument lists', () => {
        expect(validateLogicText('p().').warnings).toEqual(['Line 1: Empty argument list']);
    });

    test('skips blank lines, comments and code fences', () => {
        const result = validateLogicText('```prolog\n% comment\n\np(a).\n```');
        expect(result.valid).toBe(true);
        expect(result.issues).toEqual([]);
    });

    test('a validator instance can be reused', () => {
        const validator = new SyntaxValidator();

        expect(validator.validate('broken').valid).toBe(false);
        expect(validator.validate('p(a).').valid).toBe(true);
    });
});
