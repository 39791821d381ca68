import { describe, it, expect, vi } from 'vitest';
import { EndpointRegistry } from '../../src/application/endpoint-registry.js';
import { InMemoryEndpointRepository } from '../../src/infrastructure/memory/index.js';
import { createReloadHandler } from '../../src/infrastructure/redis/endpoint-subscriber.js';
import { fakeLogger, makeEndpoint } from '../helpers.js';

function message(reason: string, endpointId: string): string {
  return JSON.stringify({ ts: '2026-01-01T00:00:00.000Z', reason, endpoint_id: endpointId });
}

/** A promise plus the function that resolves it. */
function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe('createReloadHandler', () => {
  it('reloads the registry and logs the change', async () => {
    const registry = { reload: vi.fn().mockResolvedValue(undefined) };
    const log = fakeLogger();

    await createReloadHandler(registry, log)(message('create', 'ep-1'));

    expect(registry.reload).toHaveBeenCalledOnce();
    expect(log.info).toHaveBeenCalledWith({ reason: 'create', endpoint_id: 'ep-1' }, 'Endpoint change detected');
  });

  it('still reloads on a message that is not JSON', async () => {
    const registry = { reload: vi.fn().mockResolvedValue(undefined) };
    const log = fakeLogger();

    await createReloadHandler(registry, log)('ping');

    expect(registry.reload).toHaveBeenCalledOnce();
    expect(log.info).toHaveBeenCalledWith({ reason: undefined, endpoint_id: undefined }, 'Endpoint change detected');
  });

  it('picks up a change published while a reload is already reading', async () => {
    const repository = new InMemoryEndpointRepository();
    const registry = new EndpointRegistry(repository, fakeLogger());
    const firstRead = gate();
    vi.spyOn(repository, 'findAll').mockImplementationOnce(async () => {
      await firstRead.opened;
      return [];
    });
    const onChange = createReloadHandler(registry, fakeLogger());

    const first = onChange(message('create', 'A'));
    // Another instance writes B and publishes while the first read is in flight.
    await repository.insert(makeEndpoint({ id: 'B' }));
    const second = onChange(message('create', 'B'));
    firstRead.open();
    await Promise.all([first, second]);

    expect(registry.list().map((e) => e.id)).toEqual(['B']);
  });

  it('folds a burst of messages into one follow-up reload', async () => {
    const firstReload = gate();
    const registry = {
      reload: vi.fn()
        .mockImplementationOnce(() => firstReload.opened)
        .mockResolvedValue(undefined),
    };
    const onChange = createReloadHandler(registry, fakeLogger());

    const pending = [onChange('{}'), onChange('{}'), onChange('{}')];
    firstReload.open();
    await Promise.all(pending);

    expect(registry.reload).toHaveBeenCalledTimes(2);
  });

  it('starts a fresh reload for a message after the previous one finished', async () => {
    const registry = { reload: vi.fn().mockResolvedValue(undefined) };
    const onChange = createReloadHandler(registry, fakeLogger());

    await onChange('{}');
    await onChange('{}');

    expect(registry.reload).toHaveBeenCalledTimes(2);
  });

  it('logs reload failures and keeps handling messages', async () => {
    const registry = {
      reload: vi.fn()
        .mockRejectedValueOnce(new Error('db down'))
        .mockResolvedValue(undefined),
    };
    const log = fakeLogger();
    const onChange = createReloadHandler(registry, log);

    await expect(onChange('{}')).resolves.toBeUndefined();
    expect(log.error).toHaveBeenCalledWith({ err: expect.any(Error) }, 'Failed to reload endpoints');

    await onChange('{}');
    expect(registry.reload).toHaveBeenCalledTimes(2);
  });
});
