/**
 * Card builder
 * Resolves title, description, image and size of a preview card for a social network
 */

import type { Card, CardResult, CardSize, Image, MetadataSnapshot, Platform } from '../types';
import { defaultSize, twitterSizeFromHint } from './card-size';
import { selectTag } from './tag-selector';

interface PlatformRules {
  titleTags: readonly string[];
  descriptionTags: readonly string[];
  imageTags: readonly string[];
  typeTags: readonly string[];
  site: (snapshot: MetadataSnapshot) => string;
  size: (snapshot: MetadataSnapshot) => CardSize;
}

const PLATFORM_RULES: Record<Platform, PlatformRules> = {
  facebook: {
    titleTags: ['og:title', 'twitter:title', 'title'],
    descriptionTags: ['og:description', 'twitter:description', 'description'],
    imageTags: ['og:image', 'twitter:image', 'twitter:image:src'],
    typeTags: ['og:type'],
    site: (snapshot) => snapshot.site.toUpperCase(),
    size: () => defaultSize('facebook'),
  },
  mastodon: {
    titleTags: ['og:title', 'twitter:title', 'title'],
    descriptionTags: ['og:description', 'twitter:description', 'description'],
    imageTags: ['og:image'],
    typeTags: ['og:type'],
    site: (snapshot) => selectTag(['og:site_name'], snapshot.metadata, false) ?? snapshot.site,
    size: () => defaultSize('mastodon'),
  },
  twitter: {
    titleTags: ['twitter:title', 'og:title', 'title'],
    descriptionTags: ['twitter:description', 'og:description'],
    imageTags: ['twitter:image', 'twitter:image:src', 'og:image'],
    typeTags: ['twitter:card', 'og:type'],
    site: (snapshot) => snapshot.site,
    size: (snapshot) =>
      twitterSizeFromHint(
        Object.hasOwn(snapshot.metadata, 'twitter:card') ? snapshot.metadata['twitter:card'] : undefined
      ),
  },
};

/**
 * Build the preview card a social network would show for the page
 */
export function buildCard(snapshot: MetadataSnapshot, platform: Platform): CardResult {
  const rules = PLATFORM_RULES[platform];
  const { metadata } = snapshot;

  const site = rules.site(snapshot);
  let size = rules.size(snapshot);

  // metaTitle is what the page declared; title always has a value
  const metaTitle = selectTag(rules.titleTags, metadata, false);
  const title = metaTitle ?? (snapshot.title || site);
  const description = selectTag(rules.descriptionTags, metadata, false);
  const imageUrl = selectTag(rules.imageTags, metadata, true);
  let image: Image | undefined = imageUrl !== undefined ? { url: imageUrl } : undefined;
  const cardType = selectTag(rules.typeTags, metadata, false);

  if (platform === 'twitter' && metaTitle === undefined && description === undefined) {
    return { ok: false, error: 'NotEnoughData' };
  }

  switch (platform) {
    case 'facebook': {
      // Facebook falls back to the first image in the document
      const firstImage = snapshot.images[0];
      if (image === undefined && firstImage !== undefined) {
        image = { ...firstImage };
        size = 'medium';
      }
      break;
    }
    case 'mastodon':
      break;
    case 'twitter':
      if (cardType === undefined) {
        return { ok: false, error: 'TwitterNoCardFound' };
      }
      break;
  }

  const card: Card = Object.freeze({ title, site, description, image, size, social: platform });
  return { ok: true, card };
}

/**
 * Build the card of every platform from one snapshot
 */
export function buildCards(snapshot: MetadataSnapshot): Record<Platform, CardResult> {
  return {
    facebook: buildCard(snapshot, 'facebook'),
    mastodon: buildCard(snapshot, 'mastodon'),
    twitter: buildCard(snapshot, 'twitter'),
  };
}
