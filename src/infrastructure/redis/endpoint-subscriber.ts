import type { Logger } from 'pino';
import type { EndpointRegistry } from '../../application/index.js';
import { createRedisClient } from './client.js';
import { ENDPOINTS_CHANNEL, endpointChangeSchema } from './endpoint-notifier.js';

type Reloadable = Pick<EndpointRegistry, 'reload'>;

/**
 * Returns a message handler that keeps the registry snapshot current.
 *
 * At most one reload runs at a time. A message that arrives while one is
 * running marks the snapshot stale, and exactly one more reload follows,
 * however many messages came in meanwhile. The returned promise settles
 * once the snapshot reflects every message seen so far.
 */
export function createReloadHandler(registry: Reloadable, log: Logger): (message: string) => Promise<void> {
  let running: Promise<void> | undefined;
  let stale = false;

  const drain = async (): Promise<void> => {
    try {
      do {
        stale = false;
        try {
          await registry.reload();
        } catch (err: unknown) {
          log.error({ err }, 'Failed to reload endpoints');
        }
      } while (stale);
    } finally {
      running = undefined;
    }
  };

  return (message) => {
    const parsed = endpointChangeSchema.safeParse(safeJson(message));
    const change = parsed.success ? parsed.data : {};
    log.info({ reason: change.reason, endpoint_id: change.endpoint_id }, 'Endpoint change detected');

    if (running !== undefined) {
      stale = true;
      return running;
    }

    running = drain();
    return running;
  };
}

function safeJson(message: string): unknown {
  try {
    return JSON.parse(message);
  } catch {
    return undefined;
  }
}

/**
 * Subscribes to `endpoints_changed` on a dedicated connection and reloads
 * the registry for every change any instance publishes, its own included.
 *
 * Returns a cleanup function that unsubscribes and disconnects.
 */
export async function startEndpointSubscriber(
  redisUrl: string,
  registry: Reloadable,
  log: Logger,
): Promise<() => Promise<void>> {
  const sub = createRedisClient(redisUrl);
  const onChange = createReloadHandler(registry, log);

  await sub.connect();
  sub.on('message', (channel: string, message: string) => {
    if (channel !== ENDPOINTS_CHANNEL) return;
    void onChange(message);
  });

  await sub.subscribe(ENDPOINTS_CHANNEL);
  log.info({ channel: ENDPOINTS_CHANNEL }, 'Subscribed to endpoint changes');

  return async () => {
    await sub.unsubscribe(ENDPOINTS_CHANNEL).catch((err: unknown) => {
      log.warn({ err }, 'Endpoint subscriber unsubscribe failed');
    });
    await sub.quit().catch((err: unknown) => {
      log.warn({ err }, 'Endpoint subscriber quit failed');
    });
    log.info('Endpoint subscriber disconnected');
  };
}
