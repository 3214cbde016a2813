/**
 * Jest setup file
 * Runs before each test file, so the config module sees these values
 */

process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests

// HTTP suites send many requests through one app instance
process.env.RATE_LIMIT_MAX_REQUESTS = '10000';

// Engine settings the tests assert against
process.env.DEFAULT_CURRENCY = 'PKR';
process.env.DUPLICATE_THRESHOLD = '70';
process.env.CONFIDENCE_THRESHOLD = '0.7';

jest.setTimeout(30000);
