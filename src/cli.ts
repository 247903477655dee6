#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import boxen from 'boxen';
import ora from 'ora';
import { loadConfig } from './config.js';
import type { ReasonerConfig } from './config.js';
import { createContainer } from './container.js';
import { parse } from './parser/index.js';
import { reason } from './reasoner.js';
import type { ReasoningResult } from './reasoner.js';
import { ingestKnowledgeBase } from './pipeline.js';
import { validateLogicText } from './syntaxValidator.js';
import { KnowledgeBaseSession } from './session.js';
import {
    EVALUATION_MODES,
    JOIN_STRATEGIES,
    ReasonerException,
    createFileError,
    createInvalidArgumentError,
    errorMessage,
} from './types/index.js';
import type { EvaluateOptions, EvaluationMode, JoinStrategy } from './types/index.js';
import { formatDerivedFact, formatDiagnostic, formatFact, formatRule } from './utils/formatting.js';

const VERSION = '0.1.0';
const HELP = `
kbreason CLI v${VERSION}

Usage:
  kbreason reason <file>     Parse facts/rules and print derived facts
  kbreason parse <file>      Print parsed facts, rules and skipped lines
  kbreason validate <file>   Line-level syntax check
  kbreason ingest <file>     Translate a natural-language KB with the LLM, then reason
  kbreason repl              Interactive mode

Options:
  --mode=<single-pass|fixpoint>   Evaluation mode (default: single-pass)
  --join=<indexed|naive>          Join strategy (default: indexed)
  --help, -h                      Show this help
  --version, -v                   Show version

Examples:
  kbreason reason family.pl
  kbreason reason --mode=fixpoint ancestors.pl
  OPENAI_API_KEY=... kbreason ingest family.txt
`;

function isMode(value: string): value is EvaluationMode {
    return EVALUATION_MODES.some(mode => mode === value);
}

function isJoin(value: string): value is JoinStrategy {
    return JOIN_STRATEGIES.some(join => join === value);
}

function parseCliArgs(args: string[]): { positional: string[]; options: EvaluateOptions } {
    const positional: string[] = [];
    const options: EvaluateOptions = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const [flag, inline] = arg.split('=', 2);
        if (flag === '--mode' || flag === '--join') {
            const value = inline ?? args[++i];
            if (flag === '--mode') {
                if (!value || !isMode(value)) {
                    throw createInvalidArgumentError(`Invalid mode '${value ?? ''}'. Valid options are: ${EVALUATION_MODES.join(', ')}`);
                }
                options.mode = value;
            } else {
                if (!value || !isJoin(value)) {
                    throw createInvalidArgumentError(`Invalid join '${value ?? ''}'. Valid options are: ${JOIN_STRATEGIES.join(', ')}`);
                }
                options.join = value;
            }
        } else if (!arg.startsWith('-')) {
            positional.push(arg);
        }
    }

    return { positional, options };
}

function readInput(fileName: string | undefined): string {
    if (!fileName) {
        throw createInvalidArgumentError('file argument required');
    }
    try {
        return readFileSync(fileName, 'utf-8');
    } catch (e) {
        throw createFileError(fileName, errorMessage(e));
    }
}

function printResult(result: ReasoningResult): void {
    for (const diagnostic of result.diagnostics) {
        console.log(chalk.yellow(`⚠ ${formatDiagnostic(diagnostic)}`));
    }

    if (result.status === 'empty') {
        console.log(chalk.red('✗ Nothing to reason over: no facts or rules could be parsed'));
        return;
    }

    const derived = result.derived.toArray().map(formatDerivedFact);
    console.log(boxen(derived.length > 0 ? derived.join('\n') : chalk.dim('(none)'), {
        title: `Derived facts (${derived.length})`,
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        borderColor: 'green',
    }));
}

async function runRepl(config: ReasonerConfig, options: EvaluateOptions): Promise<void> {
    const session = new KnowledgeBaseSession({ ...config.evaluation, ...options });
    const { translator } = createContainer(config);

    console.log(chalk.bold.blue(`kbreason REPL v${VERSION}`));
    console.log(chalk.gray('Type facts and rules, or .derive, .tell <text>, .list, .clear, .quit, .help\n'));

    while (true) {
        let line: string;
        try {
            line = (await input({ message: chalk.green('kb>') })).trim();
        } catch {
            // Ctrl+C / closed stdin
            return;
        }

        if (!line) continue;

        if (line === '.help') {
            console.log(chalk.yellow(`
Commands:
  <statement>     Add a fact or rule (rules may span several lines)
  .tell <text>    Translate natural language with the LLM and add the result
  .derive         Derive facts from the current knowledge base
  .list           List parsed facts and rules
  .clear          Clear the knowledge base
  .quit, .exit    Exit
`));
        } else if (line === '.quit' || line === '.exit' || line === '.q') {
            return;
        } else if (line === '.clear') {
            session.clear();
            console.log(chalk.gray('Cleared.'));
        } else if (line === '.list') {
            const { facts, rules } = parse(session.text);
            facts.forEach(f => console.log(formatFact(f)));
            rules.forEach(r => console.log(formatRule(r)));
            if (facts.length === 0 && rules.length === 0) console.log(chalk.dim('(empty)'));
        } else if (line === '.derive') {
            printResult(session.derive());
        } else if (line.startsWith('.tell ')) {
            if (!translator) {
                console.log(chalk.red('No LLM configured: set OPENAI_API_KEY or OPENAI_BASE_URL'));
                continue;
            }
            const spinner = ora('Translating...').start();
            try {
                const logic = await translator.translate(line.slice(6).trim());
                spinner.stop();
                session.tell(logic);
                console.log(boxen(logic, { title: 'Added', borderColor: 'magenta' }));
            } catch (e) {
                spinner.stop();
                console.log(chalk.red(`✗ Translation error: ${errorMessage(e)}`));
            }
        } else if (line.startsWith('.')) {
            console.log(chalk.red(`Unknown command: ${line}`));
        } else {
            session.tell(line);
        }
    }
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    const { positional, options } = parseCliArgs(args);
    const [commandName, fileName] = positional;

    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    const config = loadConfig();
    const evaluation: EvaluateOptions = { ...config.evaluation, ...options };

    switch (commandName) {
        case 'reason': {
            printResult(reason(readInput(fileName), evaluation));
            break;
        }
        case 'parse': {
            const result = parse(readInput(fileName));
            console.log(chalk.bold(`Facts (${result.facts.length})`));
            result.facts.forEach(f => console.log(`  ${formatFact(f)}`));
            console.log(chalk.bold(`Rules (${result.rules.length})`));
            result.rules.forEach(r => console.log(`  ${formatRule(r)}`));
            result.diagnostics.forEach(d => console.log(chalk.yellow(`⚠ ${formatDiagnostic(d)}`)));
            break;
        }
        case 'validate': {
            const validation = validateLogicText(readInput(fileName));
            validation.errors.forEach(e => console.log(chalk.red(`✗ ${e}`)));
            validation.warnings.forEach(w => console.log(chalk.yellow(`⚠ ${w}`)));
            if (validation.valid) console.log(chalk.green('✓ Logic is valid'));
            process.exitCode = validation.valid ? 0 : 1;
            break;
        }
        case 'ingest': {
            const text = readInput(fileName);
            const { translator } = createContainer(config);
            if (!translator) {
                throw createInvalidArgumentError('ingest needs OPENAI_API_KEY or OPENAI_BASE_URL');
            }

            const spinner = ora('Translating knowledge base...').start();
            const result = await ingestKnowledgeBase(text, translator, {
                ...evaluation,
                onProgress: (_progress, message) => { spinner.text = message; },
            });
            spinner.stop();

            console.log(boxen(result.generatedLogic, { title: 'Generated logic', borderColor: 'cyan' }));
            if (result.refined) {
                result.validation.errors.forEach(e => console.log(chalk.red(`✗ ${e}`)));
                console.log(boxen(result.logic, { title: 'Refined logic', borderColor: 'magenta' }));
            } else {
                console.log(chalk.green('✓ Logic is valid. No refinement needed.'));
            }
            printResult(result);
            break;
        }
        case 'repl': {
            await runRepl(config, options);
            break;
        }
        default:
            console.error(chalk.red(`Unknown command: ${commandName}`));
            console.log(HELP);
            process.exitCode = 1;
    }
}

main().catch(e => {
    if (e instanceof ReasonerException) {
        console.error(chalk.red(`Error: ${e.message}`));
        if (e.error.suggestion) console.error(chalk.dim(e.error.suggestion));
    } else {
        console.error(chalk.red('Error:'), e);
    }
    process.exit(1);
});
