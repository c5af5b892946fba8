/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function getFixturePath(relativePath: string): string {
  return path.join(__dirname, 'games', relativePath);
}

/**
 * Load a PGN fixture file from fixtures/games
 */
export function loadPgnSync(relativePath: string): string {
  return fs.readFileSync(getFixturePath(relativePath), 'utf-8');
}
