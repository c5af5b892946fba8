/**
 * @slipfinder/test-utils
 *
 * Shared test doubles and fixtures
 */

export { loadPgnSync } from './fixtures/loader.js';

export {
  createMockOracle,
  oracleKey,
  cpEval,
  mateEval,
  type MockOracle,
  type MockOracleConfig,
  type OracleScript,
} from './mocks/mock-oracle.js';

export {
  createMockFetch,
  textReply,
  jsonReply,
  ndjsonReply,
  networkError,
  type MockFetch,
  type MockFetchInit,
  type MockResponse,
  type MockReply,
  type MockRoute,
} from './mocks/mock-fetch.js';

export {
  ScriptedTransport,
  scriptedFactory,
  stockfishScript,
  SEARCH_REPLY,
  type Script,
  type ScriptReply,
  type ScriptedFactory,
} from './mocks/scripted-engine.js';
