/**
 * A quote opens a quoted argument only where an argument starts: at the
 * beginning of the text or after `(` or `,`, ignoring whitespace. An
 * apostrophe inside a plain constant (`o'brien`) is an ordinary character.
 */
function opensQuote(text: string, i: number): boolean {
    const char = text[i];
    if (char !== '"' && char !== "'") return false;

    let j = i - 1;
    while (j >= 0 && /\s/.test(text[j])) j--;
    return j < 0 || text[j] === '(' || text[j] === ',';
}

/**
 * Split text on commas that sit at parenthesis depth zero.
 *
 * Commas inside parentheses or inside a quoted argument never split.
 * Each segment is trimmed; empty input yields no segments.
 */
export function splitTopLevel(text: string): string[] {
    if (text.trim() === '') {
        return [];
    }

    const segments: string[] = [];
    let depth = 0;
    let quote: string | null = null;
    let start = 0;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];

        if (quote) {
            if (char === quote) quote = null;
            continue;
        }

        if (opensQuote(text, i)) {
            quote = char;
        } else if (char === '(') {
            depth++;
        } else if (char === ')') {
            depth--;
        } else if (char === ',' && depth === 0) {
            segments.push(text.slice(start, i).trim());
            start = i + 1;
        }
    }

    segments.push(text.slice(start).trim());
    return segments;
}

/**
 * Index of the parenthesis closing the one at `open`, or -1 if unbalanced.
 */
export function findMatchingParen(text: string, open: number): number {
    let depth = 0;
    let quote: string | null = null;

    for (let i = open; i < text.length; i++) {
        const char = text[i];

        if (quote) {
            if (char === quote) quote = null;
            continue;
        }

        if (opensQuote(text, i)) {
            quote = char;
        } else if (char === '(') {
            depth++;
        } else if (char === ')') {
            depth--;
            if (depth === 0) return i;
        }
    }

    return -1;
}
