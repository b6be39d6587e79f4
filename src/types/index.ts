/**
 * Type definitions for the social preview card builder
 */

export const PLATFORMS = ['facebook', 'mastodon', 'twitter'] as const;

export type Platform = (typeof PLATFORMS)[number];

export type CardSize = 'small' | 'medium' | 'large';

export type CardBuildError = 'NotEnoughData' | 'TwitterNoCardFound';

export interface Image {
  url: string;
}

/**
 * Metadata already extracted from a page
 */
export interface MetadataSnapshot {
  metadata: Record<string, string>; // lower-cased meta-tag name -> content
  title?: string; // <title> of the page, used when no meta tag gives one
  images: Image[]; // images discovered in the document, in page order
  site: string;
}

export interface Card {
  readonly title: string;
  readonly site: string;
  readonly description?: string;
  readonly image?: Image;
  readonly size: CardSize;
  readonly social: Platform;
}

export type CardResult =
  | { ok: true; card: Card }
  | { ok: false; error: CardBuildError };

export interface CardDimensions {
  imageWidth: number;
  imageHeight: number;
  iconSize: number;
}

/**
 * HTTP response types
 */
export interface CardResponse {
  card: Card;
  dimensions: CardDimensions;
}

export interface CardErrorResponse {
  error: CardBuildError;
  message: string;
}

export type CardEntry =
  | ({ ok: true } & CardResponse)
  | ({ ok: false } & CardErrorResponse);

export interface CardsResponse {
  cards: Record<Platform, CardEntry>;
}
