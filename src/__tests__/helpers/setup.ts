/**
 * Jest Test Setup
 * Runs before each test file loads its modules
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';
