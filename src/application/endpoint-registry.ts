import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { Endpoint, NewEndpoint } from '../domain/index.js';
import { EndpointStore } from './endpoint-store.js';
import type {
  ActiveEndpointSource,
  EndpointChangeNotifier,
  EndpointChangeReason,
  EndpointRepository,
} from './ports.js';

/**
 * Single owner of the endpoint set.
 *
 * Reads are served from an in-memory snapshot (`EndpointStore`). Every
 * mutation goes through one promise-chain lock, writes to the repository,
 * then swaps a fresh snapshot in. The dispatch engine only ever sees the
 * registry through `listActive()`.
 */
export class EndpointRegistry implements ActiveEndpointSource {
  private readonly store = new EndpointStore();
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: EndpointRepository,
    private readonly log: Logger,
    private readonly notify?: EndpointChangeNotifier,
  ) {}

  /** All endpoints, active or not, in registration order. */
  list(): readonly Endpoint[] {
    return this.store.get();
  }

  get(id: string): Endpoint | undefined {
    return this.store.get().find((e) => e.id === id);
  }

  async listActive(): Promise<readonly Endpoint[]> {
    return this.store.get().filter((e) => e.is_active);
  }

  create(input: NewEndpoint): Promise<Endpoint> {
    return this.exclusive(async () => {
      const endpoint = await this.repository.insert({
        id: randomUUID(),
        name: input.name,
        url: input.url,
        is_active: input.is_active,
      });

      this.store.set([...this.store.get(), endpoint]);
      this.log.info(
        { endpoint_id: endpoint.id, name: endpoint.name, is_active: endpoint.is_active },
        'Endpoint registered',
      );

      await this.changed('create', endpoint.id);
      return endpoint;
    });
  }

  /** Sets `is_active`. Returns null for an unknown id. Repeating a value is a no-op for state. */
  setStatus(id: string, isActive: boolean): Promise<Endpoint | null> {
    return this.exclusive(async () => {
      const updated = await this.repository.updateStatus(id, isActive);
      if (updated === null) return null;

      this.store.set(this.store.get().map((e) => (e.id === id ? updated : e)));
      this.log.info({ endpoint_id: id, is_active: isActive }, 'Endpoint status updated');

      await this.changed('status', id);
      return updated;
    });
  }

  remove(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const deleted = await this.repository.delete(id);
      if (!deleted) return false;

      this.store.set(this.store.get().filter((e) => e.id !== id));
      this.log.info({ endpoint_id: id }, 'Endpoint deleted');

      await this.changed('delete', id);
      return true;
    });
  }

  /** Replaces the snapshot with whatever the repository currently holds. */
  reload(): Promise<void> {
    return this.exclusive(async () => {
      const endpoints = await this.repository.findAll();
      this.store.set(endpoints);
      this.log.info(
        {
          endpointCount: endpoints.length,
          activeCount: endpoints.filter((e) => e.is_active).length,
        },
        'Endpoints loaded',
      );
    });
  }

  private async changed(reason: EndpointChangeReason, endpointId: string): Promise<void> {
    if (this.notify) {
      await this.notify(reason, endpointId);
    }
  }

  /**
   * Runs `task` after every previously queued task has settled.
   * A failed task rejects its own caller only; the queue keeps going.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
