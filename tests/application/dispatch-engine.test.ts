import { describe, it, expect, vi } from 'vitest';
import { createDispatchEngine } from '../../src/application/dispatch-engine.js';
import type { DeliveryAttempt } from '../../src/application/delivery.js';
import { EndpointRegistry } from '../../src/application/endpoint-registry.js';
import { InMemoryEndpointRepository } from '../../src/infrastructure/memory/index.js';
import type { DeliveryOutcome, Endpoint, WebhookEvent } from '../../src/domain/index.js';
import { fakeLogger, makeEndpoint, makeOutcome } from '../helpers.js';

function makeEvent(overrides: Partial<WebhookEvent> = {}): WebhookEvent {
  return {
    id: 'evt-1',
    payload: Buffer.from('{"ok":true}'),
    receivedAt: new Date('2026-03-01T10:00:00.000Z'),
    headers: {},
    ...overrides,
  };
}

function staticSource(endpoints: Endpoint[]) {
  return { listActive: vi.fn(async () => endpoints) };
}

/** Resolves each endpoint's outcome only when the test says so. */
function deferredAttempts() {
  const pending = new Map<string, (outcome: DeliveryOutcome) => void>();
  const attempt: DeliveryAttempt = (endpoint) =>
    new Promise((resolve) => {
      pending.set(endpoint.id, resolve);
    });
  const settle = (id: string, success: boolean) => {
    const resolve = pending.get(id);
    if (!resolve) throw new Error(`no attempt in flight for ${id}`);
    resolve(makeOutcome(id, success));
  };
  return { attempt, pending, settle };
}

const succeedAll: DeliveryAttempt = async (endpoint) => makeOutcome(endpoint.id, true);

describe('createDispatchEngine', () => {
  it('returns an empty result when there are no active endpoints', async () => {
    const log = fakeLogger();
    const attempt = vi.fn(succeedAll);
    const engine = createDispatchEngine(staticSource([]), { timeoutMs: 1_000 }, log, attempt);

    const result = await engine.dispatch(makeEvent());

    expect(result).toMatchObject({ eventId: 'evt-1', total: 0, succeeded: 0, failed: 0, outcomes: [] });
    expect(attempt).not.toHaveBeenCalled();
    expect(log.info).toHaveBeenCalledWith(
      { event_id: 'evt-1', endpoint_id: undefined },
      'No active endpoints, nothing to dispatch',
    );
  });

  it('attempts every active endpoint once and counts the results', async () => {
    const endpoints = [
      makeEndpoint({ id: 'a', name: 'A' }),
      makeEndpoint({ id: 'b', name: 'B' }),
      makeEndpoint({ id: 'c', name: 'C' }),
    ];
    const attempt = vi.fn<DeliveryAttempt>(async (endpoint) => makeOutcome(endpoint.id, endpoint.id !== 'b'));
    const engine = createDispatchEngine(staticSource(endpoints), { timeoutMs: 1_000 }, fakeLogger(), attempt);

    const result = await engine.dispatch(makeEvent());

    expect(attempt).toHaveBeenCalledTimes(3);
    expect(result.total).toBe(3);
    expect(result.succeeded).toBe(2);
    expect(result.failed).toBe(1);
    expect(result.outcomes.map((o) => o.endpointId)).toEqual(['a', 'b', 'c']);
  });

  it('passes the payload, timeout and relay headers to each attempt', async () => {
    const attempt = vi.fn(succeedAll);
    const engine = createDispatchEngine(staticSource([makeEndpoint()]), { timeoutMs: 1_500 }, fakeLogger(), attempt);
    const event = makeEvent({ headers: { 'x-github-event': 'push' } });

    await engine.dispatch(event);

    expect(attempt).toHaveBeenCalledWith(makeEndpoint(), event.payload, {
      timeoutMs: 1_500,
      headers: { 'x-github-event': 'push', 'X-Relay-Event-Id': 'evt-1' },
    });
  });

  it('overrides an inbound event id header in any casing', async () => {
    const attempt = vi.fn(succeedAll);
    const engine = createDispatchEngine(staticSource([makeEndpoint()]), { timeoutMs: 1_000 }, fakeLogger(), attempt);

    await engine.dispatch(makeEvent({ headers: { 'x-relay-event-id': 'spoofed', 'X-RELAY-EVENT-ID': 'also-spoofed' } }));

    expect(attempt.mock.calls[0]?.[2].headers).toEqual({ 'X-Relay-Event-Id': 'evt-1' });
  });

  it('starts every attempt before any of them completes', async () => {
    const endpoints = [makeEndpoint({ id: 'a' }), makeEndpoint({ id: 'b' }), makeEndpoint({ id: 'c' })];
    const { attempt, pending, settle } = deferredAttempts();
    const engine = createDispatchEngine(staticSource(endpoints), { timeoutMs: 1_000 }, fakeLogger(), attempt);

    const running = engine.dispatch(makeEvent());
    await vi.waitFor(() => expect(pending.size).toBe(3));

    settle('c', true);
    settle('a', false);
    settle('b', true);
    const result = await running;

    expect(result.outcomes.map((o) => o.endpointId)).toEqual(['a', 'b', 'c']);
    expect(result.failed).toBe(1);
  });

  it('waits for every attempt even after a failure', async () => {
    const endpoints = [makeEndpoint({ id: 'a' }), makeEndpoint({ id: 'b' })];
    const { attempt, pending, settle } = deferredAttempts();
    const engine = createDispatchEngine(staticSource(endpoints), { timeoutMs: 1_000 }, fakeLogger(), attempt);

    let done = false;
    const running = engine.dispatch(makeEvent()).then((result) => {
      done = true;
      return result;
    });
    await vi.waitFor(() => expect(pending.size).toBe(2));

    settle('a', false);
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(done).toBe(false);

    settle('b', true);
    const result = await running;
    expect(result.total).toBe(2);
  });

  it('turns a rejected attempt into an "other" outcome for that endpoint only', async () => {
    const log = fakeLogger();
    const endpoints = [makeEndpoint({ id: 'a', name: 'A' }), makeEndpoint({ id: 'b', name: 'B' })];
    const attempt: DeliveryAttempt = async (endpoint) => {
      if (endpoint.id === 'a') throw new Error('kaboom');
      return makeOutcome(endpoint.id, true);
    };
    const engine = createDispatchEngine(staticSource(endpoints), { timeoutMs: 1_000 }, log, attempt);

    const result = await engine.dispatch(makeEvent());

    expect(result.succeeded).toBe(1);
    expect(result.outcomes[0]).toMatchObject({
      endpointId: 'a',
      endpointName: 'A',
      success: false,
      error: 'other',
      latencyMs: 0,
    });
    expect(result.outcomes[1]?.success).toBe(true);
    expect(log.error).toHaveBeenCalledOnce();
  });

  it('delivers only to the requested endpoint', async () => {
    const endpoints = [makeEndpoint({ id: 'a' }), makeEndpoint({ id: 'b' })];
    const attempt = vi.fn(succeedAll);
    const engine = createDispatchEngine(staticSource(endpoints), { timeoutMs: 1_000 }, fakeLogger(), attempt);

    const result = await engine.dispatch(makeEvent(), { endpointId: 'b' });

    expect(attempt).toHaveBeenCalledOnce();
    expect(result.total).toBe(1);
    expect(result.outcomes[0]?.endpointId).toBe('b');
  });

  it('delivers to nothing when the requested endpoint is not active', async () => {
    const attempt = vi.fn(succeedAll);
    const engine = createDispatchEngine(staticSource([makeEndpoint({ id: 'a' })]), { timeoutMs: 1_000 }, fakeLogger(), attempt);

    const result = await engine.dispatch(makeEvent(), { endpointId: 'missing' });

    expect(attempt).not.toHaveBeenCalled();
    expect(result.total).toBe(0);
  });

  it('stamps the result with the event id and receive time', async () => {
    const engine = createDispatchEngine(staticSource([makeEndpoint()]), { timeoutMs: 1_000 }, fakeLogger(), succeedAll);

    const result = await engine.dispatch(makeEvent({ id: 'evt-42' }));

    expect(result.eventId).toBe('evt-42');
    expect(result.receivedAt).toBe('2026-03-01T10:00:00.000Z');
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('logs the summary at warn when any delivery failed', async () => {
    const log = fakeLogger();
    const failAll: DeliveryAttempt = async (endpoint) => makeOutcome(endpoint.id, false);
    const engine = createDispatchEngine(staticSource([makeEndpoint({ id: 'a' })]), { timeoutMs: 1_000 }, log, failAll);

    await engine.dispatch(makeEvent());

    expect(log.warn).toHaveBeenCalledWith(
      { event_id: 'evt-1', total: 1, succeeded: 0, failed: 1 },
      expect.stringMatching(/^dispatch evt-1 total=1 succeeded=0 failed=1 in \d+ms \[a:connection_error\]$/),
    );
  });

  it('logs the summary at info when every delivery succeeded', async () => {
    const log = fakeLogger();
    const engine = createDispatchEngine(staticSource([makeEndpoint({ id: 'a' })]), { timeoutMs: 1_000 }, log, succeedAll);

    await engine.dispatch(makeEvent());

    expect(log.info).toHaveBeenCalledWith(
      { event_id: 'evt-1', total: 1, succeeded: 1, failed: 0 },
      expect.stringMatching(/^dispatch evt-1 total=1 succeeded=1 failed=0 in \d+ms$/),
    );
    expect(log.warn).not.toHaveBeenCalled();
  });

  describe('with a live registry', () => {
    it('keeps using the snapshot it started with while the registry changes', async () => {
      const registry = new EndpointRegistry(
        new InMemoryEndpointRepository([makeEndpoint({ id: 'a' }), makeEndpoint({ id: 'b' })]),
        fakeLogger(),
      );
      await registry.reload();
      const { attempt, pending, settle } = deferredAttempts();
      const engine = createDispatchEngine(registry, { timeoutMs: 1_000 }, fakeLogger(), attempt);

      const running = engine.dispatch(makeEvent());
      await vi.waitFor(() => expect(pending.size).toBe(2));

      await registry.remove('b');
      await registry.create({ name: 'Late', url: 'https://late.test/hook', is_active: true });

      settle('a', true);
      settle('b', true);
      const result = await running;

      expect(result.outcomes.map((o) => o.endpointId)).toEqual(['a', 'b']);
    });

    it('skips inactive endpoints', async () => {
      const registry = new EndpointRegistry(
        new InMemoryEndpointRepository([makeEndpoint({ id: 'a' }), makeEndpoint({ id: 'b', is_active: false })]),
        fakeLogger(),
      );
      await registry.reload();
      const attempt = vi.fn(succeedAll);
      const engine = createDispatchEngine(registry, { timeoutMs: 1_000 }, fakeLogger(), attempt);

      const result = await engine.dispatch(makeEvent());

      expect(result.total).toBe(1);
      expect(attempt.mock.calls.map(([endpoint]) => endpoint.id)).toEqual(['a']);
    });
  });
});
