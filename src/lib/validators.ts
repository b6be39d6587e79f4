/**
 * Request validation schemas
 */

import { z } from 'zod';
import { PLATFORMS } from '../types';

export const platformSchema = z.enum(PLATFORMS, {
  errorMap: () => ({ message: `Platform must be one of: ${PLATFORMS.join(', ')}` }),
});

const imageSchema = z.union([
  z.string().min(1, 'Image URL cannot be empty'),
  z.object({ url: z.string().min(1, 'Image URL cannot be empty') }),
]);

/**
 * Body of a card request: metadata already extracted from a page
 */
export const snapshotSchema = z.object({
  site: z.string({ required_error: 'Site is required' }).trim().min(1, 'Site is required'),
  title: z.string().optional(),
  metadata: z.record(z.string(), z.string()).optional().default({}),
  images: z.array(imageSchema).optional().default([]),
});

export type SnapshotInput = z.infer<typeof snapshotSchema>;
