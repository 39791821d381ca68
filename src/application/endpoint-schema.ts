import { z } from 'zod';

const httpUrl = z
  .string({ required_error: 'URL is required' })
  .trim()
  .min(1, 'URL cannot be empty')
  .url('Invalid URL format')
  .refine((value) => !URL.canParse(value) || /^https?:$/.test(new URL(value).protocol), {
    message: 'URL must use http or https',
  });

/**
 * Schema for POST /endpoints.
 * `is_active` defaults to false so new endpoints start disabled.
 */
export const createEndpointSchema = z.object({
  name: z
    .string({ required_error: 'Name is required' })
    .trim()
    .min(1, 'Name cannot be empty')
    .max(255),
  url: httpUrl,
  is_active: z.boolean().optional().default(false),
});

export type CreateEndpointInput = z.infer<typeof createEndpointSchema>;

/** Schema for PUT /endpoints/:id/status. */
export const updateStatusSchema = z.object({
  is_active: z.boolean({ required_error: 'is_active is required' }),
});

export type UpdateStatusInput = z.infer<typeof updateStatusSchema>;

/**
 * Shape of one persisted endpoint record (file backend).
 * Ids from older files may be any non-empty string.
 */
export const storedEndpointSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  url: z.string(),
  is_active: z.boolean().default(false),
});

export const storedEndpointListSchema = z.array(storedEndpointSchema);
