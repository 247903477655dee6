/**
 * Core data model: terms, facts, rules and parse diagnostics.
 */

/**
 * One argument position of a rule head or body call.
 * Variables start with an uppercase letter or `_`; `_` alone is anonymous.
 */
export type Term =
    | { kind: 'constant'; value: string }
    | { kind: 'variable'; name: string };

/** A ground argument tuple. */
export type Tuple = readonly string[];

export interface Fact {
    readonly predicate: string;
    readonly values: Tuple;
    /** 1-based source line, when parsed from text */
    readonly line?: number;
}

export interface Atom {
    readonly predicate: string;
    readonly args: readonly Term[];
}

export interface Rule {
    readonly head: Atom;
    /** Never empty: rules without a parsable body call are discarded */
    readonly body: readonly Atom[];
    readonly source?: string;
    readonly line?: number;
}

export type DiagnosticKind =
    | 'MalformedLine'
    | 'MalformedBodyCall'
    | 'EmptyRuleBody'
    | 'UnterminatedRule';

/**
 * A statement (or part of one) that was skipped while parsing.
 */
export interface Diagnostic {
    kind: DiagnosticKind;
    line: number;
    text: string;
    message: string;
}

export interface ParseResult {
    facts: Fact[];
    rules: Rule[];
    diagnostics: Diagnostic[];
}

export interface DerivedFact {
    readonly predicate: string;
    readonly values: Tuple;
}

/** Value substituted for a head variable that no body call binds. */
export const UNKNOWN_VALUE = '?';

export const RULE_OPERATOR = ':-';
export const TERMINATOR = '.';
