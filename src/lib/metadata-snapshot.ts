/**
 * Shared snapshot normalization
 * Turns caller-supplied page metadata into the snapshot the card builder reads
 */

import type { Image, MetadataSnapshot } from '../types';

export interface RawSnapshot {
  site: string;
  title?: string;
  metadata?: Record<string, string>;
  images?: Array<string | Image>;
}

/**
 * Normalize raw page metadata.
 * Tag names are lower-cased; on a case-only clash the later entry wins.
 */
export function toMetadataSnapshot(raw: RawSnapshot): MetadataSnapshot {
  const metadata: Record<string, string> = {};
  for (const [name, content] of Object.entries(raw.metadata ?? {})) {
    metadata[name.toLowerCase()] = content;
  }

  const images: Image[] = (raw.images ?? []).map((image) =>
    typeof image === 'string' ? { url: image } : { url: image.url }
  );

  return {
    metadata,
    title: raw.title || undefined,
    images,
    site: raw.site,
  };
}
