/**
 * Jest setup file.
 * Logs are silenced and the global fetch is replaced by a stub that fails,
 * so no test can reach the network by accident.
 */

process.env.LOG_LEVEL = 'silent';

declare const global: { fetch?: typeof fetch };

global.fetch = (jest.fn(() => Promise.reject(new Error('network disabled in tests'))) as unknown) as typeof fetch;

export {};
