/**
 * Response types for tool handlers
 */

/**
 * Response verbosity: 'minimal' (token-efficient), 'standard' (default), 'detailed' (debug info)
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface MinimalReasonResponse {
    status: 'ok' | 'empty';
    derived: string[];
}

export interface StandardReasonResponse extends MinimalReasonResponse {
    counts: {
        facts: number;
        rules: number;
        derived: number;
    };
    diagnostics: string[];
}

export interface DetailedReasonResponse extends StandardReasonResponse {
    facts: string[];
    rules: string[];
}

export type ReasonResponse = MinimalReasonResponse | StandardReasonResponse | DetailedReasonResponse;

export interface ParseResponse {
    facts: string[];
    rules: string[];
    diagnostics: string[];
}

export interface IngestResponse {
    logic: string;
    refined: boolean;
    validationErrors: string[];
    result: ReasonResponse;
}
