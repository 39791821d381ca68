import { asc, eq } from 'drizzle-orm';
import type { Endpoint } from '../../domain/index.js';
import { InternalError } from '../../domain/index.js';
import type { EndpointRepository } from '../../application/index.js';
import type { Database } from './client.js';
import { endpoints } from './schema.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Row shape returned by endpoint queries. */
export type EndpointRow = typeof endpoints.$inferSelect;

function toEndpoint(row: EndpointRow): Endpoint {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    is_active: row.is_active,
  };
}

export async function findAllEndpoints(db: Database): Promise<Endpoint[]> {
  const rows = await db.select().from(endpoints).orderBy(asc(endpoints.created_at));
  return rows.map(toEndpoint);
}

export async function insertEndpoint(db: Database, endpoint: Endpoint): Promise<Endpoint> {
  const now = new Date();
  const [row] = await db.insert(endpoints).values({
    id: endpoint.id,
    name: endpoint.name,
    url: endpoint.url,
    is_active: endpoint.is_active,
    created_at: now,
    updated_at: now,
  }).returning();

  if (row === undefined) {
    throw new InternalError(`Insert of endpoint ${endpoint.id} returned no row`);
  }
  return toEndpoint(row);
}

/** Non-UUID ids cannot exist in the table; they are reported as not found. */
export async function updateEndpointStatus(
  db: Database,
  id: string,
  isActive: boolean,
): Promise<Endpoint | null> {
  if (!UUID_RE.test(id)) return null;

  const rows = await db.update(endpoints)
    .set({ is_active: isActive, updated_at: new Date() })
    .where(eq(endpoints.id, id))
    .returning();

  const row = rows[0];
  return row === undefined ? null : toEndpoint(row);
}

export async function deleteEndpoint(db: Database, id: string): Promise<boolean> {
  if (!UUID_RE.test(id)) return false;

  const rows = await db.delete(endpoints)
    .where(eq(endpoints.id, id))
    .returning({ id: endpoints.id });

  return rows.length > 0;
}

/** Adapts the query functions above to the registry's repository port. */
export function createPgEndpointRepository(db: Database): EndpointRepository {
  return {
    findAll: () => findAllEndpoints(db),
    insert: (endpoint) => insertEndpoint(db, endpoint),
    updateStatus: (id, isActive) => updateEndpointStatus(db, id, isActive),
    delete: (id) => deleteEndpoint(db, id),
  };
}
