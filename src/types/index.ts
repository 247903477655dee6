/**
 * Shared type definitions for kbreason
 */

// Re-export error types
export {
    ReasonerException,
    createConfigError,
    createLLMError,
    createInvalidArgumentError,
    createFileError,
    serializeReasonerError,
    errorMessage,
} from './errors.js';

export type {
    ReasonerErrorCode,
    ReasonerError,
} from './errors.js';

// Re-export logic types
export { UNKNOWN_VALUE, RULE_OPERATOR, TERMINATOR } from './logic.js';

export type {
    Term,
    Tuple,
    Fact,
    Atom,
    Rule,
    DiagnosticKind,
    Diagnostic,
    ParseResult,
    DerivedFact,
} from './logic.js';

// Re-export LLM types
export type {
    LLMMessage,
    LLMResponse,
    LLMProvider,
    LLMConfig,
    TranslationStrategy,
} from './llm.js';

// Re-export option types
export { DEFAULTS, EVALUATION_MODES, JOIN_STRATEGIES } from './options.js';

export type {
    EvaluationMode,
    JoinStrategy,
    EvaluateOptions,
    ReasonOptions,
} from './options.js';

// Re-export response types
export type {
    Verbosity,
    MinimalReasonResponse,
    StandardReasonResponse,
    DetailedReasonResponse,
    ReasonResponse,
    ParseResponse,
    IngestResponse,
} from './responses.js';
