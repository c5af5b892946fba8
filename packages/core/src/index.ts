/**
 * @slipfinder/core - Move classification and the trainer contract
 *
 * - Score normalization and severity classification
 * - Game walking against a position oracle
 * - Trainer cards and move verification
 */

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './classifier/index.js';
export * from './walker/index.js';
export * from './trainer/index.js';
