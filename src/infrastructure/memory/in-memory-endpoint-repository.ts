import type { Endpoint } from '../../domain/index.js';
import type { EndpointRepository } from '../../application/index.js';

/**
 * Map-backed endpoint repository.
 *
 * Nothing survives a restart. Used for ephemeral runs
 * (`REGISTRY_BACKEND=memory`) and in tests.
 */
export class InMemoryEndpointRepository implements EndpointRepository {
  private readonly endpoints: Map<string, Endpoint> = new Map();

  constructor(initial: readonly Endpoint[] = []) {
    for (const endpoint of initial) {
      this.endpoints.set(endpoint.id, endpoint);
    }
  }

  async findAll(): Promise<Endpoint[]> {
    return [...this.endpoints.values()];
  }

  async insert(endpoint: Endpoint): Promise<Endpoint> {
    this.endpoints.set(endpoint.id, endpoint);
    return endpoint;
  }

  async updateStatus(id: string, isActive: boolean): Promise<Endpoint | null> {
    const existing = this.endpoints.get(id);
    if (existing === undefined) return null;

    const updated: Endpoint = { ...existing, is_active: isActive };
    this.endpoints.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.endpoints.delete(id);
  }
}
