import type { IncomingHttpHeaders } from 'node:http';

/**
 * Headers never copied from the inbound request to a downstream delivery:
 * hop-by-hop headers, headers describing the inbound body framing,
 * `host`, which must name the destination rather than the relay, and the
 * relay's own event id header.
 */
const EXCLUDED = new Set([
  'host',
  'content-length',
  'content-type',
  'connection',
  'keep-alive',
  'transfer-encoding',
  'te',
  'trailer',
  'upgrade',
  'expect',
  'proxy-authorization',
  'proxy-authenticate',
  'accept-encoding',
  'x-relay-event-id',
]);

/**
 * Picks the inbound headers that are safe to forward.
 * Repeated headers are joined with ", ".
 */
export function selectForwardHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const selected: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (EXCLUDED.has(key) || value === undefined) continue;
    selected[key] = Array.isArray(value) ? value.join(', ') : value;
  }

  return selected;
}
