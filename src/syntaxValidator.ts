/**
 * Syntax Validator for logic text
 *
 * Line-level checks used to decide whether generated logic needs to be sent
 * back for refinement. Errors trigger refinement; warnings are advisory.
 */

import { RULE_OPERATOR, TERMINATOR } from './types/index.js';
import { isCommentLine, stripCodeFences } from './parser/index.js';

export interface LineIssue {
    line: number;
    severity: 'error' | 'warning';
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    /** Error messages, formatted `Line N: ...` */
    errors: string[];
    warnings: string[];
    issues: LineIssue[];
}

/**
 * Syntax Validator for fact and rule statements
 */
export class SyntaxValidator {
    private issues: LineIssue[] = [];
    /** A rule has started (`:-` seen) and its terminating line has not */
    private inRule = false;

    /**
     * Validate every non-blank, non-comment line of `text`
     */
    validate(text: string): ValidationResult {
        this.issues = [];
        this.inRule = false;

        stripCodeFences(text).split('\n').forEach((raw, index) => {
            const line = raw.trim();
            if (!line || isCommentLine(line)) return;
            this.checkLine(line, index + 1);
        });

        const errors = this.issues.filter(i => i.severity === 'error').map(i => `Line ${i.line}: ${i.message}`);
        const warnings = this.issues.filter(i => i.severity === 'warning').map(i => `Line ${i.line}: ${i.message}`);

        return {
            valid: errors.length === 0,
            errors,
            warnings,
            issues: [...this.issues],
        };
    }

    private checkLine(line: string, lineNumber: number): void {
        if (line.includes(RULE_OPERATOR)) this.inRule = true;
        this.checkTerminator(line, lineNumber);
        if (line.endsWith(TERMINATOR)) this.inRule = false;

        if (line !== RULE_OPERATOR && (!line.includes('(') || !line.includes(')'))) {
            this.issues.push({ line: lineNumber, severity: 'error', message: 'Missing parentheses.' });
        } else {
            this.checkBalancedParens(line, lineNumber);
        }

        this.checkNaming(line, lineNumber);
    }

    /**
     * A line must end with the terminator, unless it continues an open rule
     */
    private checkTerminator(line: string, lineNumber: number): void {
        if (line.endsWith(TERMINATOR) || line.endsWith(RULE_OPERATOR)) return;
        if (this.inRule && line.endsWith(',')) return;
        this.issues.push({ line: lineNumber, severity: 'error', message: 'Missing period at end.' });
    }

    /**
     * Check for balanced parentheses
     */
    private checkBalancedParens(line: string, lineNumber: number): void {
        let depth = 0;

        for (let i = 0; i < line.length; i++) {
            if (line[i] === '(') {
                depth++;
            } else if (line[i] === ')') {
                depth--;
                if (depth < 0) {
                    this.issues.push({ line: lineNumber, severity: 'warning', message: `Unmatched closing parenthesis at position ${i}` });
                    return;
                }
            }
        }

        if (depth > 0) {
            this.issues.push({ line: lineNumber, severity: 'warning', message: 'Unmatched opening parenthesis' });
        }
    }

    /**
     * Check predicate naming conventions
     */
    private checkNaming(line: string, lineNumber: number): void {
        const pattern = /(?:^|[\s,(])([A-Za-z_][A-Za-z0-9_]*)\s*\(/g;
        let match;

        while ((match = pattern.exec(line)) !== null) {
            const name = match[1];
            if (/^[A-Z]/.test(name)) {
                this.issues.push({
                    line: lineNumber,
                    severity: 'warning',
                    message: `Predicate '${name}' starts with uppercase - predicates are conventionally lowercase`,
                });
            }
        }

        if (/\(\s*\)/.test(line)) {
            this.issues.push({ line: lineNumber, severity: 'warning', message: 'Empty argument list' });
        }
    }
}

/**
 * Validate logic text with a fresh validator
 */
export function validateLogicText(text: string): ValidationResult {
    return new SyntaxValidator().validate(text);
}
