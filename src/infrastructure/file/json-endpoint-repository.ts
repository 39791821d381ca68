import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Endpoint } from '../../domain/index.js';
import type { EndpointRepository } from '../../application/index.js';
import { storedEndpointListSchema } from '../../application/index.js';

/**
 * Endpoint records persisted as a pretty-printed JSON array on disk.
 *
 * Every mutation rewrites the whole file through a temp file + rename, so
 * a crash mid-write leaves the previous version in place. Callers (the
 * registry) serialize mutations; this class does no locking of its own.
 */
export class JsonFileEndpointRepository implements EndpointRepository {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  /** A missing file is an empty registry. An unreadable or invalid one is an error. */
  async findAll(): Promise<Endpoint[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err: unknown) {
      throw new Error(`Endpoints file ${this.filePath} is not valid JSON`, { cause: err });
    }

    const parsed = storedEndpointListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Endpoints file ${this.filePath} has invalid records: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      );
    }

    return parsed.data;
  }

  async insert(endpoint: Endpoint): Promise<Endpoint> {
    const all = await this.findAll();
    await this.save([...all, endpoint]);
    return endpoint;
  }

  async updateStatus(id: string, isActive: boolean): Promise<Endpoint | null> {
    const all = await this.findAll();
    const existing = all.find((e) => e.id === id);
    if (existing === undefined) return null;

    const updated: Endpoint = { ...existing, is_active: isActive };
    await this.save(all.map((e) => (e.id === id ? updated : e)));
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const all = await this.findAll();
    const remaining = all.filter((e) => e.id !== id);
    if (remaining.length === all.length) return false;

    await this.save(remaining);
    return true;
  }

  private async save(endpoints: readonly Endpoint[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmpPath, `${JSON.stringify(endpoints, null, 2)}\n`, 'utf-8');
    await rename(tmpPath, this.filePath);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
