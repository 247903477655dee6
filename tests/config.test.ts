import { loadConfig, hasLLMAccess } from '../src/config.js';
import { ReasonerException } from '../src/types/index.js';

describe('loadConfig', () => {
    test('applies defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            llm: {
                apiKey: undefined,
                baseURL: undefined,
                model: 'gpt-4o',
                temperature: 0,
                maxRetries: 2,
            },
            evaluation: { mode: 'single-pass', join: 'indexed' },
        });
    });

    test('reads and coerces every variable', () => {
        const config = loadConfig({
            OPENAI_API_KEY: 'test-key',
            OPENAI_BASE_URL: 'http://localhost:11434/v1',
            MODEL_NAME: 'llama3',
            LLM_TEMPERATURE: '0.5',
            LLM_MAX_RETRIES: '0',
            KB_EVALUATION_MODE: 'fixpoint',
            KB_JOIN_STRATEGY: 'naive',
        });

        expect(config.llm).toEqual({
            apiKey: 'test-key',
            baseURL: 'http://localhost:11434/v1',
            model: 'llama3',
            temperature: 0.5,
            maxRetries: 0,
        });
        expect(config.evaluation).toEqual({ mode: 'fixpoint', join: 'naive' });
    });

    test('treats empty strings as unset', () => {
        const config = loadConfig({ OPENAI_API_KEY: '', MODEL_NAME: '' });

        expect(config.llm.apiKey).toBeUndefined();
        expect(config.llm.model).toBe('gpt-4o');
        expect(hasLLMAccess(config)).toBe(false);
    });

    test('rejects invalid values with a CONFIG_ERROR', () => {
        expect(() => loadConfig({ KB_EVALUATION_MODE: 'forever' })).toThrow(/KB_EVALUATION_MODE/);

        try {
            loadConfig({ OPENAI_BASE_URL: 'not a url' });
            throw new Error('expected loadConfig to throw');
        } catch (e) {
            expect(e).toBeInstanceOf(ReasonerException);
            if (e instanceof ReasonerException) {
                expect(e.error.code).toBe('CONFIG_ERROR');
            }
        }
    });

    test('hasLLMAccess needs a key or a base URL', () => {
        expect(hasLLMAccess(loadConfig({ OPENAI_API_KEY: 'test-key' }))).toBe(true);
        expect(hasLLMAccess(loadConfig({ OPENAI_BASE_URL: 'http://localhost:8080/v1' }))).toBe(true);
        expect(hasLLMAccess(loadConfig({}))).toBe(false);
    });
});
