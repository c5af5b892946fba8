/**
 * Orchestrator module exports
 */

export type { Services, ServiceOverrides } from './services.js';
export { performHealthChecks, initializeServices, closeServices } from './services.js';

export type { RunSource, RunResult } from './orchestrator.js';
export { orchestrateRun, filtersFromConfig } from './orchestrator.js';
