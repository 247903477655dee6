/**
 * Forward-chaining rule evaluator.
 *
 * Each rule is joined against the fact store, its head instantiated for
 * every consistent binding, and the results collected into one
 * deduplicated set.
 */

import type { Fact, Rule } from '../../types/index.js';
import { DEFAULTS } from '../../types/options.js';
import type { EvaluateOptions, JoinStrategy } from '../../types/options.js';
import { DerivedFactSet } from './derived.js';
import { FactStore } from './factStore.js';
import { joinBody } from './join.js';
import { instantiateHead } from './unify.js';

/**
 * Fire every rule once against `store`, adding heads to `derived`.
 * Returns the number of facts that were new.
 */
function applyRules(
    rules: readonly Rule[],
    store: FactStore,
    join: JoinStrategy,
    derived: DerivedFactSet
): number {
    let added = 0;
    for (const rule of rules) {
        for (const binding of joinBody(rule.body, store, join)) {
            const isNew = derived.add({
                predicate: rule.head.predicate,
                values: instantiateHead(rule.head, binding),
            });
            if (isNew) added++;
        }
    }
    return added;
}

/**
 * Derive new facts from `facts` and `rules`.
 *
 * In the default 'single-pass' mode each rule runs exactly once over the
 * parsed facts and nothing derived is fed back. 'fixpoint' mode re-runs the
 * rules over parsed and derived facts until a pass adds nothing; it always
 * terminates because rules never introduce new constants beyond the
 * sentinel value.
 *
 * Pure and total: empty inputs give an empty set.
 */
export function evaluate(
    facts: readonly Pick<Fact, 'predicate' | 'values'>[],
    rules: readonly Rule[],
    options: EvaluateOptions = {}
): DerivedFactSet {
    const mode = options.mode ?? DEFAULTS.mode;
    const join = options.join ?? DEFAULTS.join;
    const derived = new DerivedFactSet();

    if (mode === 'single-pass') {
        applyRules(rules, FactStore.from(facts), join, derived);
        return derived;
    }

    let store = FactStore.from(facts);
    while (applyRules(rules, store, join, derived) > 0) {
        store = FactStore.from([...facts, ...derived]);
    }
    return derived;
}
