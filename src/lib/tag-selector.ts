/**
 * Meta-tag lookup
 * Picks the first usable value from a priority list of tag names
 */

/**
 * Get the first available value from the candidate tags.
 * With `requireUrl`, values that don't parse as an absolute URL are skipped.
 */
export function selectTag(
  candidates: readonly string[],
  metadata: Readonly<Record<string, string>>,
  requireUrl: boolean
): string | undefined {
  for (const key of candidates) {
    if (!Object.hasOwn(metadata, key)) continue;
    const content = metadata[key];
    if (content === undefined) continue;

    if (requireUrl) {
      if (!isParseableUrl(content.trim())) continue;
    } else if (content === '') {
      continue;
    }

    return content;
  }

  return undefined;
}

function isParseableUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
