/**
 * kbreason - Library Entry Point
 *
 * Exports the parser, evaluator and pipeline for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Parser
export {
    parse,
    parsePredicate,
    parseAtom,
    classifyTerm,
    splitTopLevel,
    structureRule,
    StatementAccumulator,
    splitStatements,
    stripCodeFences,
} from './parser/index.js';

// Forward-chaining engine
export {
    evaluate,
    DerivedFactSet,
    FactStore,
    indexedJoin,
    naiveJoin,
} from './engines/forward/index.js';

export { reason } from './reasoner.js';
export type { ReasoningResult } from './reasoner.js';

// Validation
export { SyntaxValidator, validateLogicText } from './syntaxValidator.js';
export type { ValidationResult, LineIssue } from './syntaxValidator.js';

// LLM pipeline
export { AiSdkProvider } from './llm/provider.js';
export { LogicTranslator } from './llm/translator.js';
export { extractLogicText } from './llm/outputParser.js';
export { ingestKnowledgeBase } from './pipeline.js';
export type { IngestionResult } from './pipeline.js';

// Configuration
export { loadConfig, hasLLMAccess } from './config.js';
export type { ReasonerConfig } from './config.js';

// Formatting
export { formatFact, formatRule, formatAtom, formatDerivedFact, formatDiagnostic } from './utils/formatting.js';

// Types and Interfaces
export * from './types/index.js';
