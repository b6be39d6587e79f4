/**
 * Response headers for card responses
 */

import type { AppConfig } from './config';

export function generateSuccessHeaders(config: AppConfig): Record<string, string> {
  return {
    'Cache-Control': `public, max-age=${config.CACHE_MAX_AGE}`,
  };
}

export function generateErrorHeaders(): Record<string, string> {
  return {
    'Cache-Control': 'no-store',
  };
}
