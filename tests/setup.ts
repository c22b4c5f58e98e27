import { config } from 'dotenv';
import { vi } from 'vitest';
import type { Mock } from 'vitest';

// Load test environment variables
config({ path: '.env.test' });

// Set before any module under test reads them
process.env.NODE_ENV = 'test';
process.env.OPENAI_API_KEY = 'test-secret';
process.env.LLM_MODEL = 'gpt-4o-mini';
process.env.LLM_TEMPERATURE = '0.1';
process.env.ENABLE_CACHING = 'false';
process.env.LOG_LEVEL = 'error';

type MockAgent = 'evaluator' | 'analyzer' | 'improvement';

interface MockLogger {
    info: Mock;
    error: Mock;
    warn: Mock;
    debug: Mock;
}

// Global test utilities
declare global {
    var testUtils: {
        generateMockAgentResponse: (agent: MockAgent, overrides?: Record<string, unknown>) => string;
        createMockLogger: () => MockLogger;
    };
}

const defaultResponses: Record<MockAgent, Record<string, unknown>> = {
    evaluator: {
        score: 4,
        rationale: 'Correct approach with a clear explanation of the trade-offs.'
    },
    analyzer: {
        strengths: ['Explains when an index helps reads'],
        weaknesses: ['Does not mention the write cost of indexes'],
        summary: 'Solid answer that covers the main trade-offs.'
    },
    improvement: {
        suggestion: 'Describe how each extra index slows down inserts and updates.'
    }
};

globalThis.testUtils = {
    generateMockAgentResponse: (agent: MockAgent, overrides: Record<string, unknown> = {}) =>
        JSON.stringify({ ...defaultResponses[agent], ...overrides }),

    createMockLogger: () => ({
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    })
};
