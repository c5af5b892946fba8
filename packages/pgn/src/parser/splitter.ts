/**
 * Splitting of multi-game PGN text and light-weight tag reading.
 *
 * Neither function validates moves; they work on text alone so that a game
 * whose move list is broken can still be identified by its headers.
 */

/** Every game exported by Lichess opens with an Event tag */
const BOUNDARY_PATTERN = /^(?=\[Event ")/m;
const TAG_PATTERN = /^\s*\[([A-Za-z0-9_]+)\s+"((?:[^"\\]|\\.)*)"\s*\]\s*$/gm;

/**
 * Split a blob of PGN text into one chunk per game
 *
 * Chunks are trimmed and empty ones dropped. Text before the first event
 * tag is kept as its own chunk when it is not blank.
 */
export function splitPgnGames(text: string): string[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(BOUNDARY_PATTERN)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}

/**
 * Read the header tags of a single game as plain strings
 */
export function extractTags(pgnText: string): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const match of pgnText.matchAll(TAG_PATTERN)) {
    const [, name, value] = match;
    if (name !== undefined && value !== undefined && !(name in tags)) {
      tags[name] = value.replace(/\\(["\\])/g, '$1');
    }
  }
  return tags;
}
