import { describe, it, expect } from 'vitest';
import { buildCard, buildCards } from '../src/lib/card-builder';
import type { Card, CardResult, MetadataSnapshot } from '../src/types';

function snapshot(overrides: Partial<MetadataSnapshot> = {}): MetadataSnapshot {
  return {
    metadata: {},
    images: [],
    site: 'example.com',
    ...overrides,
  };
}

function expectCard(result: CardResult): Card {
  if (!result.ok) {
    throw new Error(`Expected a card, got ${result.error}`);
  }
  return result.card;
}

describe('buildCard', () => {
  describe('fallback title', () => {
    const page = snapshot({ title: 'Fallback title' });

    it('uses the page title when no meta tag has one', () => {
      expect(expectCard(buildCard(page, 'facebook')).title).toBe('Fallback title');
      expect(expectCard(buildCard(page, 'mastodon')).title).toBe('Fallback title');
    });

    it('fails on Twitter when the metadata has nothing', () => {
      expect(buildCard(page, 'twitter')).toEqual({ ok: false, error: 'NotEnoughData' });
    });

    it('falls back to the resolved site without a page title', () => {
      expect(expectCard(buildCard(snapshot(), 'facebook')).title).toBe('EXAMPLE.COM');
      expect(expectCard(buildCard(snapshot(), 'mastodon')).title).toBe('example.com');
    });

    it('treats an empty page title as missing', () => {
      const card = expectCard(buildCard(snapshot({ title: '' }), 'mastodon'));
      expect(card.title).toBe('example.com');
    });
  });

  describe('facebook', () => {
    it('prefers OpenGraph tags and upper-cases the site', () => {
      const card = expectCard(
        buildCard(
          snapshot({
            metadata: {
              'og:title': 'OG title',
              'twitter:title': 'Twitter title',
              description: 'Plain description',
              'og:image': 'https://example.com/og.png',
            },
          }),
          'facebook'
        )
      );

      expect(card).toEqual({
        title: 'OG title',
        site: 'EXAMPLE.COM',
        description: 'Plain description',
        image: { url: 'https://example.com/og.png' },
        size: 'large',
        social: 'facebook',
      });
    });

    it('takes the first document image and shrinks the card when no image tag exists', () => {
      const images = [{ url: 'https://example.com/first.jpg' }, { url: 'https://example.com/second.jpg' }];
      const card = expectCard(buildCard(snapshot({ images }), 'facebook'));

      expect(card.image).toEqual({ url: 'https://example.com/first.jpg' });
      expect(card.size).toBe('medium');
    });

    it('ignores document images when an image tag is present', () => {
      const card = expectCard(
        buildCard(
          snapshot({
            metadata: { 'twitter:image:src': 'https://cdn.example.com/tw.png' },
            images: [{ url: 'https://example.com/first.jpg' }],
          }),
          'facebook'
        )
      );

      expect(card.image).toEqual({ url: 'https://cdn.example.com/tw.png' });
      expect(card.size).toBe('large');
    });

    it('uses document images when the image tag is not a URL', () => {
      const card = expectCard(
        buildCard(
          snapshot({
            metadata: { 'og:image': 'cover.png' },
            images: [{ url: 'https://example.com/first.jpg' }],
          }),
          'facebook'
        )
      );

      expect(card.image).toEqual({ url: 'https://example.com/first.jpg' });
      expect(card.size).toBe('medium');
    });
  });

  describe('mastodon', () => {
    it('uses og:site_name as the site', () => {
      const card = expectCard(buildCard(snapshot({ metadata: { 'og:site_name': 'ExampleSite' } }), 'mastodon'));
      expect(card.site).toBe('ExampleSite');
    });

    it('keeps the site when og:site_name is empty', () => {
      const card = expectCard(buildCard(snapshot({ metadata: { 'og:site_name': '' } }), 'mastodon'));
      expect(card.site).toBe('example.com');
    });

    it('is always small whatever twitter:card says', () => {
      const card = expectCard(
        buildCard(snapshot({ metadata: { 'twitter:card': 'summary_large_image' } }), 'mastodon')
      );
      expect(card.size).toBe('small');
    });

    it('only reads og:image for the image', () => {
      const card = expectCard(
        buildCard(
          snapshot({
            metadata: { 'twitter:image': 'https://example.com/tw.png' },
            images: [{ url: 'https://example.com/first.jpg' }],
          }),
          'mastodon'
        )
      );
      expect(card.image).toBeUndefined();
    });
  });

  describe('twitter', () => {
    it('builds a medium card from a summary', () => {
      const card = expectCard(
        buildCard(snapshot({ metadata: { 'twitter:title': 'Hello', 'twitter:card': 'summary' } }), 'twitter')
      );

      expect(card).toEqual({
        title: 'Hello',
        site: 'example.com',
        description: undefined,
        image: undefined,
        size: 'medium',
        social: 'twitter',
      });
    });

    it('sizes the card from twitter:card', () => {
      const sizeFor = (metadata: Record<string, string>) =>
        expectCard(buildCard(snapshot({ metadata: { 'twitter:title': 'Hello', ...metadata } }), 'twitter')).size;

      expect(sizeFor({ 'twitter:card': 'summary_large_image' })).toBe('large');
      expect(sizeFor({ 'twitter:card': 'app' })).toBe('large');
      expect(sizeFor({ 'og:type': 'website' })).toBe('medium');
      expect(sizeFor({ 'twitter:card': '', 'og:type': 'website' })).toBe('large');
    });

    it('prefers Twitter tags', () => {
      const card = expectCard(
        buildCard(
          snapshot({
            metadata: {
              'og:title': 'OG title',
              'twitter:title': 'Twitter title',
              'og:description': 'OG description',
              'twitter:description': 'Twitter description',
              'og:image': 'https://example.com/og.png',
              'twitter:image': 'https://example.com/tw.png',
              'twitter:card': 'summary_large_image',
            },
          }),
          'twitter'
        )
      );

      expect(card.title).toBe('Twitter title');
      expect(card.description).toBe('Twitter description');
      expect(card.image).toEqual({ url: 'https://example.com/tw.png' });
    });

    it('does not read the plain description tag', () => {
      const result = buildCard(snapshot({ metadata: { description: 'Plain', 'og:type': 'article' } }), 'twitter');
      expect(result).toEqual({ ok: false, error: 'NotEnoughData' });
    });

    it('builds from a description alone, titled with the page title', () => {
      const card = expectCard(
        buildCard(
          snapshot({ title: 'Page', metadata: { 'og:description': 'About', 'og:type': 'article' } }),
          'twitter'
        )
      );
      expect(card.title).toBe('Page');
      expect(card.description).toBe('About');
    });

    it('fails without a card type even with title and description', () => {
      const result = buildCard(
        snapshot({ metadata: { 'twitter:title': 'Hello', 'twitter:description': 'World' } }),
        'twitter'
      );
      expect(result).toEqual({ ok: false, error: 'TwitterNoCardFound' });
    });

    it('reports missing data before a missing card type', () => {
      expect(buildCard(snapshot(), 'twitter')).toEqual({ ok: false, error: 'NotEnoughData' });
    });
  });

  it('returns a frozen card', () => {
    const card = expectCard(buildCard(snapshot(), 'mastodon'));
    expect(Object.isFrozen(card)).toBe(true);
  });

  it('does not modify the snapshot', () => {
    const page = snapshot({ images: [{ url: 'https://example.com/first.jpg' }], metadata: { title: 'T' } });
    const copy = structuredClone(page);
    buildCard(page, 'facebook');
    expect(page).toEqual(copy);
  });
});

describe('buildCards', () => {
  it('builds one result per platform', () => {
    const page = snapshot({ metadata: { 'og:title': 'Shared', 'og:site_name': 'Example' } });
    const results = buildCards(page);

    expect(results.facebook).toEqual(buildCard(page, 'facebook'));
    expect(results.mastodon).toEqual(buildCard(page, 'mastodon'));
    expect(results.twitter).toEqual({ ok: false, error: 'TwitterNoCardFound' });
  });
});
