const LINK_PATTERN = /<([^>]+)>\s*;\s*rel="([^"]+)"/;

/**
 * Parse an RFC 8288 Link header into a map of relation name to URL.
 *
 * @example
 * parseLinkHeader('<https://api.github.com/x?page=2>; rel="next"')
 * // => { next: 'https://api.github.com/x?page=2' }
 */
export function parseLinkHeader(value: string | undefined): Record<string, string> {
  const links: Record<string, string> = {};
  if (!value) return links;

  for (const part of value.split(',')) {
    const match = LINK_PATTERN.exec(part.trim());
    if (!match) continue;
    const [, url, rels] = match;
    if (url === undefined || rels === undefined) continue;
    for (const rel of rels.split(/\s+/)) {
      links[rel] = url;
    }
  }

  return links;
}
