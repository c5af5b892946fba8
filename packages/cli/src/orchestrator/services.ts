/**
 * Service initialization and health checking
 */

import { StockfishOracle, type PositionOracle, type TransportFactory } from '@slipfinder/engine';
import { GameRetriever, LichessClient, type FetchLike } from '@slipfinder/lichess';

import type { SlipfinderConfig } from '../config/schema.js';
import type { ServiceStatus } from '../progress/types.js';

/**
 * Initialized services container
 */
export interface Services {
  oracle: PositionOracle;
  lichess: LichessClient;
  retriever: GameRetriever;
}

/**
 * Replacements for the process and network edges
 */
export interface ServiceOverrides {
  fetch?: FetchLike;
  transportFactory?: TransportFactory;
}

/**
 * Build the services for a run. Nothing is started here: the engine
 * launches on its first query.
 */
export function initializeServices(config: SlipfinderConfig, overrides: ServiceOverrides = {}): Services {
  const { path, threads, hashMb, readyTimeoutMs, searchTimeoutMs } = config.engine;
  const oracle = new StockfishOracle(
    { path, threads, hashMb, readyTimeoutMs, searchTimeoutMs },
    overrides.transportFactory,
  );

  const lichess = new LichessClient({
    baseUrl: config.lichess.baseUrl,
    timeoutMs: config.lichess.timeoutMs,
    ...(config.lichess.token ? { token: config.lichess.token } : {}),
    ...(overrides.fetch ? { fetch: overrides.fetch } : {}),
  });

  return { oracle, lichess, retriever: new GameRetriever(lichess) };
}

/**
 * Release the engine. Safe to call more than once.
 */
export async function closeServices(services: Services): Promise<void> {
  await services.oracle.close();
}

async function checkEngine(config: SlipfinderConfig, oracle: PositionOracle): Promise<ServiceStatus> {
  const label = `Engine (${config.engine.path})`;
  if (!(oracle instanceof StockfishOracle)) {
    return { name: label, healthy: true };
  }

  const startTime = Date.now();
  try {
    const health = await oracle.healthCheck();
    const latencyMs = Date.now() - startTime;
    const name = health.name ? `${health.name} (${config.engine.path})` : label;
    if (health.healthy) {
      return { name, healthy: true, latencyMs };
    }
    return { name, healthy: false, error: 'no handshake' };
  } catch (error) {
    return {
      name: label,
      healthy: false,
      error: error instanceof Error ? error.message : 'failed to start',
    };
  }
}

async function checkLichessUser(lichess: LichessClient, username: string): Promise<ServiceStatus> {
  const label = `Lichess user ${username}`;
  const startTime = Date.now();
  try {
    const user = await lichess.getUser(username);
    return { name: `Lichess user ${user.username}`, healthy: true, latencyMs: Date.now() - startTime };
  } catch (error) {
    return {
      name: label,
      healthy: false,
      error: error instanceof Error ? error.message : 'lookup failed',
    };
  }
}

/**
 * Perform the pre-run checks: the engine always, the account when a
 * username is given
 */
export async function performHealthChecks(
  config: SlipfinderConfig,
  services: Services,
  username?: string,
): Promise<ServiceStatus[]> {
  const results: ServiceStatus[] = [await checkEngine(config, services.oracle)];
  if (username) {
    results.push(await checkLichessUser(services.lichess, username));
  }
  return results;
}
