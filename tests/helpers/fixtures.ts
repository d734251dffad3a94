/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read and parse a JSON fixture
 */
export function readJsonFixture(...parts: string[]): unknown {
  return JSON.parse(fs.readFileSync(getFixturePath(...parts), 'utf-8'));
}

/**
 * Sample words for training
 */
export const SAMPLE_WORDS = ['fool', 'food', 'loose'];
