import type { Context } from 'hono';

/**
 * Best-effort client IP from proxy headers
 */
export function getClientIp(c: Context): string | null {
  const forwarded = c.req.header('x-forwarded-for');
  if (forwarded) {
    const first = forwarded.split(',')[0]?.trim();
    if (first) return first;
  }

  return c.req.header('x-real-ip') || c.req.header('cf-connecting-ip') || null;
}
