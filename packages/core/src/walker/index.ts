export { GameWalker, type GameWalkerConfig, type WalkOptions } from './game-walker.js';
export { gameIdFromUrl, playerSide, readHeaderMeta } from './headers.js';
