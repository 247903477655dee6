import { reason, parse, evaluate, formatDerivedFact, UNKNOWN_VALUE } from '../src/lib.js';

describe('Library Export', () => {
    test('should import reason and use it', () => {
        const result = reason('sibling(tom, mary).\nuncle(X, W) :- sibling(X, Y).');

        expect(result.status).toBe('ok');
        expect(result.derived.toArray().map(formatDerivedFact)).toEqual([`uncle(tom, ${UNKNOWN_VALUE})`]);
    });

    test('should import parse and evaluate and use them', () => {
        expect(() => parse('(')).not.toThrow();

        const { facts, rules } = parse('p(a).\nq(X) :- p(X).');
        expect(evaluate(facts, rules).has('q', ['a'])).toBe(true);
    });
});
