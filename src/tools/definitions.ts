import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (derived facts only), 'standard' (default, adds counts and diagnostics), 'detailed' (adds parsed facts and rules)",
};

const modeSchema = {
    type: 'string',
    enum: ['single-pass', 'fixpoint'],
    description: "Evaluation mode: 'single-pass' fires every rule once over the parsed facts (default); 'fixpoint' feeds derived facts back until nothing new appears.",
};

const joinSchema = {
    type: 'string',
    enum: ['indexed', 'naive'],
    description: "Join strategy: 'indexed' (default) or 'naive' cross-product. Both give the same results.",
};

const logicSchema = {
    type: 'string',
    description: 'Logic text: facts like parent(john, mary). and rules like grandparent(X, Y) :- parent(X, Z), parent(Z, Y).',
};

export const TOOLS: Tool[] = [
    {
        name: 'parse-logic',
        description: `Parse logic text into facts and rules without evaluating.

**When to use:** Inspect how statements are read, or find out which lines are skipped.

**Example:**
  logic: "parent(john, mary).\\nbroken line"
  → Returns: { facts: ["parent(john, mary)."], rules: [], diagnostics: ["Line 2 [MalformedLine]: ..."] }`,
        inputSchema: {
            type: 'object',
            properties: {
                logic: logicSchema,
            },
            required: ['logic'],
        },
    },
    {
        name: 'check-logic',
        description: `Line-level syntax check of logic text.

**When to use:** Before reasoning over generated logic, to find lines missing a period or parentheses.
Errors are formatted "Line N: ..." and can be sent back to a model for correction.`,
        inputSchema: {
            type: 'object',
            properties: {
                logic: logicSchema,
            },
            required: ['logic'],
        },
    },
    {
        name: 'reason',
        description: `Derive new facts from logic text by forward chaining.

**Example:**
  logic: "parent(john, mary).\\nparent(mary, susan).\\ngrandparent(X, Y) :- parent(X, Z), parent(Z, Y)."
  → Returns: { status: "ok", derived: ["grandparent(john, susan)"] }

**Notes:**
- Uppercase arguments in rules are variables; lowercase ones are constants that must match exactly.
- A head variable never bound by the body is reported as "?".`,
        inputSchema: {
            type: 'object',
            properties: {
                logic: logicSchema,
                mode: modeSchema,
                join: joinSchema,
                verbosity: verbositySchema,
            },
            required: ['logic'],
        },
    },
    {
        name: 'ingest-knowledge-base',
        description: `Translate a natural-language knowledge base to logic with the configured LLM, repair it once if malformed, and reason over it.

**Requires:** OPENAI_API_KEY or OPENAI_BASE_URL on the server.`,
        inputSchema: {
            type: 'object',
            properties: {
                text: {
                    type: 'string',
                    description: 'Knowledge base in natural language',
                },
                mode: modeSchema,
                join: joinSchema,
                verbosity: verbositySchema,
            },
            required: ['text'],
        },
    },
];
