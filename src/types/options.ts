export type EvaluationMode = 'single-pass' | 'fixpoint';
export type JoinStrategy = 'indexed' | 'naive';

export interface EvaluateOptions {
    /** 'single-pass' never feeds derived facts back into the rules */
    mode?: EvaluationMode;
    join?: JoinStrategy;
}

export interface ReasonOptions extends EvaluateOptions {
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export const EVALUATION_MODES: readonly EvaluationMode[] = ['single-pass', 'fixpoint'];
export const JOIN_STRATEGIES: readonly JoinStrategy[] = ['indexed', 'naive'];

export const DEFAULTS = {
    mode: 'single-pass',
    join: 'indexed',
    model: 'gpt-4o',
    temperature: 0,
    maxRetries: 2,
} as const;
