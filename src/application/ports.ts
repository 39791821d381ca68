import type { Endpoint } from '../domain/index.js';

/**
 * Persistence behind the endpoint registry.
 *
 * Implementations do not need their own locking: the registry
 * serializes every call that mutates state.
 */
export interface EndpointRepository {
  findAll(): Promise<Endpoint[]>;
  insert(endpoint: Endpoint): Promise<Endpoint>;
  /** Returns the updated record, or null when `id` is unknown. */
  updateStatus(id: string, isActive: boolean): Promise<Endpoint | null>;
  /** Returns false when `id` is unknown. */
  delete(id: string): Promise<boolean>;
}

export type EndpointChangeReason = 'create' | 'status' | 'delete';

/**
 * Called after every successful registry mutation.
 * Must not reject: failures are the notifier's to log.
 */
export type EndpointChangeNotifier = (
  reason: EndpointChangeReason,
  endpointId: string,
) => Promise<void>;

/** The only view of the registry the dispatch engine gets. */
export interface ActiveEndpointSource {
  listActive(): Promise<readonly Endpoint[]>;
}
