/**
 * Main Hono application
 * Handles API routes and request processing
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import type { AppConfig } from './lib/config';
import type {
  CardBuildError,
  CardEntry,
  CardErrorResponse,
  CardResponse,
  CardResult,
  CardsResponse,
  MetadataSnapshot,
  Platform,
} from './types';
import { buildCard, buildCards } from './lib/card-builder';
import { dimensionsFor } from './lib/card-size';
import { toMetadataSnapshot } from './lib/metadata-snapshot';
import { platformSchema, snapshotSchema } from './lib/validators';
import { generateSuccessHeaders, generateErrorHeaders } from './lib/http-headers';
import { logRequest, logCardBuild, logger } from './lib/logger';
import { getClientIp } from './lib/request-ip';

const CARD_ERROR_MESSAGES: Record<CardBuildError, string> = {
  NotEnoughData: 'Page lacks social metadata',
  TwitterNoCardFound: 'Page has no recognized Twitter card type',
};

export function createApp(config: AppConfig) {
  const app = new Hono();

  // CORS middleware
  app.use(
    '*',
    cors({
      origin: config.ALLOWED_ORIGINS === '*' ? '*' : config.ALLOWED_ORIGINS.split(','),
    })
  );

  // Request logging middleware
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;

    logRequest({
      method: c.req.method,
      path: c.req.path,
      statusCode: c.res.status,
      responseTime: duration,
      userAgent: c.req.header('user-agent'),
      ip: getClientIp(c) || undefined,
    });
  });

  const limitBody = bodyLimit({
    maxSize: config.MAX_BODY_SIZE,
    onError: (c) => c.json({ error: 'Request body too large' }, 413, generateErrorHeaders()),
  });

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Root endpoint - redirect to documentation when configured
  app.get('/', (c) => {
    if (config.REDIRECT_URL) {
      return c.redirect(config.REDIRECT_URL, 302);
    }
    return c.json({ error: 'POST a snapshot to /card/:platform or /cards' }, 400, generateErrorHeaders());
  });

  // Cards for every platform at once
  app.post('/cards', limitBody, async (c) => {
    const parsed = await readSnapshot(c);
    if (!parsed.success) {
      return c.json({ error: parsed.error }, 400, generateErrorHeaders());
    }

    const results = buildCards(parsed.snapshot);
    const cards: CardsResponse['cards'] = {
      facebook: toEntry(parsed.snapshot, 'facebook', results.facebook),
      mastodon: toEntry(parsed.snapshot, 'mastodon', results.mastodon),
      twitter: toEntry(parsed.snapshot, 'twitter', results.twitter),
    };

    const body: CardsResponse = { cards };
    return c.json(body, 200, generateSuccessHeaders(config));
  });

  // Card for a single platform
  app.post('/card/:platform', limitBody, async (c) => {
    const platformResult = platformSchema.safeParse(c.req.param('platform'));
    if (!platformResult.success) {
      const firstError = platformResult.error.issues[0];
      const errorMessage = firstError ? firstError.message : 'Invalid platform';
      return c.json({ error: errorMessage }, 400, generateErrorHeaders());
    }
    const platform = platformResult.data;

    const parsed = await readSnapshot(c);
    if (!parsed.success) {
      return c.json({ error: parsed.error }, 400, generateErrorHeaders());
    }

    const entry = toEntry(parsed.snapshot, platform, buildCard(parsed.snapshot, platform));
    if (!entry.ok) {
      const body: CardErrorResponse = { error: entry.error, message: entry.message };
      return c.json(body, 422, generateErrorHeaders());
    }

    const body: CardResponse = { card: entry.card, dimensions: entry.dimensions };
    return c.json(body, 200, generateSuccessHeaders(config));
  });

  // Errors thrown by handlers; the body limit middleware replaces this response with its own
  app.onError((error, c) => {
    logger.error({ err: error, path: c.req.path }, 'Error processing request');
    return c.json({ error: 'Internal server error' }, 500, generateErrorHeaders());
  });

  return app;
}

/**
 * Parse and validate the snapshot in the request body
 */
async function readSnapshot(
  c: Context
): Promise<{ success: true; snapshot: MetadataSnapshot } | { success: false; error: string }> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { success: false, error: 'Request body must be valid JSON' };
    }
    throw error;
  }

  const parseResult = snapshotSchema.safeParse(json);
  if (!parseResult.success) {
    const firstError = parseResult.error.issues[0];
    return { success: false, error: firstError ? firstError.message : 'Invalid request body' };
  }

  return { success: true, snapshot: toMetadataSnapshot(parseResult.data) };
}

/**
 * Log a build result and shape it for the response
 */
function toEntry(snapshot: MetadataSnapshot, platform: Platform, result: CardResult): CardEntry {
  if (!result.ok) {
    logCardBuild({ platform, site: snapshot.site, success: false, error: result.error });
    return { ok: false, error: result.error, message: CARD_ERROR_MESSAGES[result.error] };
  }

  logCardBuild({ platform, site: snapshot.site, success: true, size: result.card.size });
  return { ok: true, card: result.card, dimensions: dimensionsFor(result.card.size) };
}
