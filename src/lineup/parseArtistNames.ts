/**
 * Split a model reply into artist names: one per line, trimmed, blank lines
 * dropped, order kept. Duplicates are kept as-is.
 */
export function parseArtistNames(responseText: string): string[] {
  return responseText
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
