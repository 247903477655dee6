/**
 * Tests for the forward-chaining evaluator
 */

import { evaluate } from '../src/engines/forward/index.js';
import { CHAIN_LOGIC, derivedLines, program } from './fixtures.js';

describe('evaluate', () => {
    const grandparent = program(`
        parent(john, mary).
        parent(mary, susan).
        grandparent(X, Y) :- parent(X, Z), parent(Z, Y).
    `);

    test('derives grandparent through a shared variable', () => {
        const derived = evaluate(grandparent.facts, grandparent.rules);

        expect(derived.toArray()).toEqual([{ predicate: 'grandparent', values: ['john', 'susan'] }]);
    });

    test('is idempotent', () => {
        const first = evaluate(grandparent.facts, grandparent.rules);
        const second = evaluate(grandparent.facts, grandparent.rules);

        expect(second.toArray()).toEqual(first.toArray());
    });

    test('empty facts or empty rules give an empty set', () => {
        expect(evaluate([], grandparent.rules).size).toBe(0);
        expect(evaluate(grandparent.facts, []).size).toBe(0);
        expect(evaluate([], []).size).toBe(0);
    });

    test('a rule over unknown predicates does not affect other rules', () => {
        const { facts, rules } = program(`
            parent(john, mary).
            parent(mary, susan).
            grandparent(X, Y) :- parent(X, Z), parent(Z, Y).
            orphan(X) :- missing(X).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['grandparent(john, susan)']);
    });

    test('duplicate derivations appear once', () => {
        const { facts, rules } = program(`
            p(a).
            p(a).
            q(a).
            s(X) :- p(X).
            s(X) :- q(X).
        `);

        const derived = evaluate(facts, rules);
        expect(derived.size).toBe(1);
        expect(derived.has('s', ['a'])).toBe(true);
    });

    test('constants in the body must match the fact value', () => {
        const { facts, rules } = program(`
            parent(john, mary).
            parent(tom, alice).
            child_of_john(Y) :- parent(john, Y).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['child_of_john(mary)']);
    });

    test('a variable bound twice must agree', () => {
        const { facts, rules } = program(`
            p(a, a).
            p(a, b).
            same(X) :- p(X, X).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['same(a)']);
    });

    test('anonymous variables never conflict', () => {
        const { facts, rules } = program(`
            parent(john, mary).
            parent(john, tom).
            r(a, b, c).
            has_child(X) :- parent(X, _).
            q(X) :- r(X, _, _).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['has_child(john)', 'q(a)']);
    });

    test('an unbound head variable becomes the unknown sentinel', () => {
        const { facts, rules } = program(`
            sibling(tom, mary).
            uncle(X, W) :- sibling(X, Y).
        `);

        expect(evaluate(facts, rules).toArray()).toEqual([{ predicate: 'uncle', values: ['tom', '?'] }]);
    });

    test('head constants are emitted literally', () => {
        const { facts, rules } = program(`
            parent(john, mary).
            person(X, yes) :- parent(X, _).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['person(john, yes)']);
    });

    test('a call never matches a fact of different arity', () => {
        const { facts, rules } = program(`
            p(a, b).
            q(X) :- p(X).
        `);

        expect(evaluate(facts, rules).size).toBe(0);
    });

    test('constants containing an apostrophe match literally', () => {
        const { facts, rules } = program(`
            knows(ann, o'neil).
            likes(bob, tea).
            friend(X, Y) :- knows(X, o'neil), likes(Y, tea).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['friend(ann, bob)']);
    });

    test('derives uncle from sibling and parent', () => {
        const { facts, rules } = program(`
            parent(john, mary).
            parent(tom, alice).
            sibling(mary, tom).
            ancestor(alice, emma).
            uncle(X, Y) :- sibling(X, Z), parent(Z, Y).
        `);

        expect(derivedLines(evaluate(facts, rules))).toEqual(['uncle(mary, alice)']);
    });

    describe('evaluation modes', () => {
        const chain = program(CHAIN_LOGIC);

        test('single-pass never feeds derived facts back', () => {
            expect(derivedLines(evaluate(chain.facts, chain.rules))).toEqual([
                'ancestor(a, b)',
                'ancestor(b, c)',
                'ancestor(c, d)',
            ]);
        });

        test('fixpoint chains until nothing new is derived', () => {
            const derived = evaluate(chain.facts, chain.rules, { mode: 'fixpoint' });

            expect(derivedLines(derived)).toEqual([
                'ancestor(a, b)',
                'ancestor(a, c)',
                'ancestor(a, d)',
                'ancestor(b, c)',
                'ancestor(b, d)',
                'ancestor(c, d)',
            ]);
        });
    });

    describe('join strategies agree', () => {
        const scenarios: Record<string, string> = {
            grandparent: `
                parent(john, mary). parent(mary, susan). parent(mary, sam). parent(sam, ann).
                grandparent(X, Y) :- parent(X, Z), parent(Z, Y).
            `,
            threeWay: `
                edge(a, b). edge(b, c). edge(c, a). edge(c, d). edge(b, b).
                path3(X, W) :- edge(X, Y), edge(Y, Z), edge(Z, W).
            `,
            constantsAndRepeats: `
                likes(ann, tea). likes(bob, tea). likes(bob, bob). likes(cid, coffee).
                tea_fan(X) :- likes(X, tea).
                narcissist(X) :- likes(X, X).
                share(X, Y) :- likes(X, D), likes(Y, D).
            `,
            anonymousAndUnbound: `
                owns(ann, car). owns(bob, bike). owns(bob, car).
                owner(X) :- owns(X, _).
                pair(X, Q) :- owns(X, car), owns(_, bike).
            `,
        };

        test.each(Object.entries(scenarios))('%s', (_name, text) => {
            // Statements share lines here, so split them first
            const { facts, rules } = program(text.replace(/\.\s+/g, '.\n'));
            const naive = evaluate(facts, rules, { join: 'naive' });
            const indexed = evaluate(facts, rules, { join: 'indexed' });

            expect(indexed.size).toBeGreaterThan(0);
            expect(derivedLines(indexed)).toEqual(derivedLines(naive));
        });

        test('fixpoint results agree too', () => {
            const { facts, rules } = program(CHAIN_LOGIC);

            expect(derivedLines(evaluate(facts, rules, { mode: 'fixpoint', join: 'naive' })))
                .toEqual(derivedLines(evaluate(facts, rules, { mode: 'fixpoint', join: 'indexed' })));
        });
    });
});
