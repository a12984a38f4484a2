/**
 * Jest test setup file
 *
 * Runs before every test file.
 */

import { jest, beforeAll, afterAll } from '@jest/globals';

// Everything runs against in-process stand-ins
jest.setTimeout(10000);

// A LOG_FILE set in the calling shell must not make the CLI tests write to it
delete process.env['LOG_FILE'];

// Mock console.warn to reduce noise in tests (but allow errors)
beforeAll(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});
