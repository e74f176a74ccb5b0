import { vi } from 'vitest';
import type { GeneratedPosition } from '../src/mappings/position-index.js';

/**
 * Shorthand for a generated position in fixtures.
 */
export function pos(generatedLine: number, generatedColumn: number, name?: string): GeneratedPosition {
  return name === undefined ? { generatedLine, generatedColumn } : { generatedLine, generatedColumn, name };
}

/**
 * Replace console output with spies for the duration of a test.
 * Call `vi.restoreAllMocks()` afterwards.
 */
export function silenceConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}
