/**
 * Jest setup file for scanner tests
 * Runs after the test framework is set up but before each test file
 */

import * as matchers from 'jest-extended';

expect.extend(matchers);

// Structured log lines are noise in test output
const originalConsole = global.console;
global.console = {
  ...console,
  error: process.env.DEBUG_TESTS ? originalConsole.error : jest.fn(),
  warn: process.env.DEBUG_TESTS ? originalConsole.warn : jest.fn(),
  log: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
};

process.env.NODE_ENV = 'test';

jest.setTimeout(10000);
