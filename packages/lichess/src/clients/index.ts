export { LichessClient, DEFAULT_LICHESS_CONFIG } from './lichess.js';
export {
  BaseHttpClient,
  type HttpClientConfig,
  type FetchLike,
  type FetchInit,
  type FetchResponse,
} from './base.js';
