export { evaluate } from './evaluator.js';
export { DerivedFactSet } from './derived.js';
export { FactStore, tupleKey } from './factStore.js';
export { indexedJoin, naiveJoin, joinBody } from './join.js';
export { matchAtom, instantiateHead, EMPTY_BINDING } from './unify.js';
export type { Binding } from './unify.js';
