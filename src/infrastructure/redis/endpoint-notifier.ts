import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { EndpointChangeNotifier } from '../../application/index.js';

export const ENDPOINTS_CHANNEL = 'endpoints_changed';

/**
 * Message published on `endpoints_changed`.
 * Every field is optional on the way in: any message means "reload".
 */
export const endpointChangeSchema = z
  .object({
    ts: z.string(),
    reason: z.enum(['create', 'status', 'delete']),
    endpoint_id: z.string(),
  })
  .partial();

export type EndpointChangePayload = Required<z.infer<typeof endpointChangeSchema>>;

/**
 * Registry hook that announces each mutation to every relay instance.
 *
 * A failed publish is logged and swallowed; the local mutation has
 * already succeeded and the HTTP response must not depend on Redis.
 */
export function createEndpointChangeNotifier(
  redis: Pick<Redis, 'publish'>,
  log: Logger,
): EndpointChangeNotifier {
  return async (reason, endpointId) => {
    const payload: EndpointChangePayload = {
      ts: new Date().toISOString(),
      reason,
      endpoint_id: endpointId,
    };

    let receivers: number;
    try {
      receivers = await redis.publish(ENDPOINTS_CHANNEL, JSON.stringify(payload));
    } catch (err: unknown) {
      log.error({ err, reason, endpoint_id: endpointId }, 'Failed to publish endpoint change notification');
      return;
    }

    log.debug({ reason, endpoint_id: endpointId, receivers }, 'Endpoint change published');
  };
}
