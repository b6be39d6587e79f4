/**
 * Card size classification and the nominal pixel sizes a renderer uses for it
 */

import type { CardDimensions, CardSize, Platform } from '../types';

const DIMENSIONS: Record<CardSize, CardDimensions> = {
  small: { imageWidth: 64, imageHeight: 64, iconSize: 32 }, // Mastodon
  medium: { imageWidth: 125, imageHeight: 125, iconSize: 48 }, // Twitter summary
  large: { imageWidth: 500, imageHeight: 250, iconSize: 64 }, // Twitter large image, Facebook
};

export function defaultSize(platform: Platform): CardSize {
  switch (platform) {
    case 'facebook':
      return 'large';
    case 'mastodon':
      return 'small';
    case 'twitter':
      return 'large';
  }
}

/**
 * Size of a Twitter card from its `twitter:card` value
 */
export function twitterSizeFromHint(hint: string | undefined): CardSize {
  if (hint === undefined) return 'medium';

  switch (hint) {
    case 'summary_large_image':
      return 'large';
    case 'summary':
      return 'medium';
    default:
      return defaultSize('twitter');
  }
}

export function dimensionsFor(size: CardSize): CardDimensions {
  return { ...DIMENSIONS[size] };
}
