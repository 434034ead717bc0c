import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import {
  RESOURCE_SCHEMAS,
  objectKey,
  type AnyResource,
  type NamespacedName,
  type ResourceKind,
  type ResourceMap,
} from '../types/resources.js';
import { AlreadyExistsError, ConflictError, NotFoundError } from '../types/errors.js';

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED';

export interface WatchEvent {
  type: WatchEventType;
  kind: ResourceKind;
  object: AnyResource;
}

export type WatchListener = (event: WatchEvent) => void;

/**
 * The CRUD+watch contract the reconcilers consume.
 *
 * - `update` is optimistic: a `resourceVersion` that no longer matches fails with `ConflictError`.
 * - `delete` only marks an object (sets `deletionTimestamp`) while it still has finalizers;
 *   clearing the last finalizer through `update` removes it.
 * - Removing an object removes, by the same rules, every object holding an owner reference to it.
 */
export interface ResourceStore {
  get<K extends ResourceKind>(kind: K, key: NamespacedName, signal?: AbortSignal): Promise<ResourceMap[K]>;
  list<K extends ResourceKind>(kind: K, namespace?: string, signal?: AbortSignal): Promise<ResourceMap[K][]>;
  create<T extends AnyResource>(obj: T, signal?: AbortSignal): Promise<T>;
  update<T extends AnyResource>(obj: T, signal?: AbortSignal): Promise<T>;
  delete(kind: ResourceKind, key: NamespacedName, signal?: AbortSignal): Promise<void>;
  watch(listener: WatchListener): () => void;
}

export interface SqliteResourceStoreOptions {
  /** An open database, e.g. `new Database(':memory:')` in tests. Takes precedence over `path`. */
  database?: BetterSqlite3.Database;
  path?: string;
  now?: () => Date;
}

interface ResourceRow {
  kind: string;
  namespace: string;
  name: string;
  uid: string;
  resource_version: number;
  body: string;
}

function isResourceKind(value: string): value is ResourceKind {
  return Object.prototype.hasOwnProperty.call(RESOURCE_SCHEMAS, value);
}

function openDatabase(options: SqliteResourceStoreOptions): BetterSqlite3.Database {
  if (options.database) {
    return options.database;
  }
  const dbPath = options.path ?? ':memory:';
  if (dbPath !== ':memory:' && !fs.existsSync(path.dirname(dbPath))) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  return new Database(dbPath);
}

export class SqliteResourceStore implements ResourceStore {
  private readonly db: BetterSqlite3.Database;
  private readonly now: () => Date;
  private readonly listeners: Set<WatchListener> = new Set();

  constructor(options: SqliteResourceStoreOptions = {}) {
    this.db = openDatabase(options);
    this.now = options.now ?? (() => new Date());
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS resources (
        kind TEXT NOT NULL,
        namespace TEXT NOT NULL,
        name TEXT NOT NULL,
        uid TEXT NOT NULL UNIQUE,
        resource_version INTEGER NOT NULL,
        body TEXT NOT NULL,
        PRIMARY KEY (kind, namespace, name)
      );

      CREATE INDEX IF NOT EXISTS idx_resources_namespace ON resources(namespace);

      CREATE TABLE IF NOT EXISTS resource_meta (
        key TEXT PRIMARY KEY,
        value INTEGER NOT NULL
      );
    `);
  }

  async get<K extends ResourceKind>(kind: K, key: NamespacedName, signal?: AbortSignal): Promise<ResourceMap[K]> {
    signal?.throwIfAborted();
    const row = this.selectRow(kind, key);
    if (!row) {
      throw new NotFoundError(kind, objectKey(key));
    }
    return this.decode(kind, row);
  }

  async list<K extends ResourceKind>(kind: K, namespace?: string, signal?: AbortSignal): Promise<ResourceMap[K][]> {
    signal?.throwIfAborted();
    const rows = namespace === undefined
      ? this.db
        .prepare('SELECT * FROM resources WHERE kind = ? ORDER BY namespace, name')
        .all(kind) as ResourceRow[]
      : this.db
        .prepare('SELECT * FROM resources WHERE kind = ? AND namespace = ? ORDER BY name')
        .all(kind, namespace) as ResourceRow[];
    return rows.map((row) => this.decode(kind, row));
  }

  async create<T extends AnyResource>(obj: T, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    const events: WatchEvent[] = [];
    const created = this.db.transaction(() => {
      if (this.selectRow(obj.kind, obj.metadata)) {
        throw new AlreadyExistsError(obj.kind, objectKey(obj.metadata));
      }
      for (const owner of obj.metadata.ownerReferences ?? []) {
        const exists = this.db
          .prepare('SELECT 1 FROM resources WHERE uid = ? AND namespace = ?')
          .get(owner.uid, obj.metadata.namespace);
        if (!exists) {
          throw new NotFoundError(owner.kind, `${obj.metadata.namespace}/${owner.name}`);
        }
      }

      const version = this.nextResourceVersion();
      const stored = {
        ...obj,
        metadata: {
          ...obj.metadata,
          uid: randomUUID(),
          resourceVersion: String(version),
          creationTimestamp: this.now().toISOString(),
          deletionTimestamp: undefined,
        },
      };
      this.validate(stored);
      this.db
        .prepare(
          `INSERT INTO resources (kind, namespace, name, uid, resource_version, body)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(stored.kind, stored.metadata.namespace, stored.metadata.name, stored.metadata.uid, version, JSON.stringify(stored));
      events.push({ type: 'ADDED', kind: stored.kind, object: stored });
      return stored;
    })();
    this.emit(events);
    return created;
  }

  async update<T extends AnyResource>(obj: T, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    const events: WatchEvent[] = [];
    const updated = this.db.transaction(() => {
      const row = this.selectRow(obj.kind, obj.metadata);
      if (!row) {
        throw new NotFoundError(obj.kind, objectKey(obj.metadata));
      }
      const expected = obj.metadata.resourceVersion;
      if (expected !== undefined && expected !== String(row.resource_version)) {
        throw new ConflictError(obj.kind, objectKey(obj.metadata), expected, String(row.resource_version));
      }

      const current = this.decodeAny(row);
      const incoming: AnyResource = obj;
      if (current.kind === 'Secret' && incoming.kind === 'Secret' && current.immutable
        && JSON.stringify(current.data) !== JSON.stringify(incoming.data)) {
        throw new Error(`Secret "${objectKey(obj.metadata)}" is immutable; its data cannot be changed`);
      }

      const version = this.nextResourceVersion();
      const next = {
        ...obj,
        metadata: {
          ...obj.metadata,
          uid: current.metadata.uid,
          creationTimestamp: current.metadata.creationTimestamp,
          deletionTimestamp: current.metadata.deletionTimestamp,
          resourceVersion: String(version),
        },
      };
      this.validate(next);

      if (next.metadata.deletionTimestamp && (next.metadata.finalizers ?? []).length === 0) {
        this.removeRow(row, next, events);
        return next;
      }

      this.db
        .prepare('UPDATE resources SET resource_version = ?, body = ? WHERE uid = ?')
        .run(version, JSON.stringify(next), row.uid);
      events.push({ type: 'MODIFIED', kind: next.kind, object: next });
      return next;
    })();
    this.emit(events);
    return updated;
  }

  async delete(kind: ResourceKind, key: NamespacedName, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const events: WatchEvent[] = [];
    this.db.transaction(() => {
      const row = this.selectRow(kind, key);
      if (!row) {
        throw new NotFoundError(kind, objectKey(key));
      }
      this.deleteRow(row, events);
    })();
    this.emit(events);
  }

  watch(listener: WatchListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  close(): void {
    this.listeners.clear();
    this.db.close();
  }

  // ── Private Helpers ────────────────────────────────────────────────────────

  private selectRow(kind: ResourceKind, key: NamespacedName): ResourceRow | undefined {
    return this.db
      .prepare('SELECT * FROM resources WHERE kind = ? AND namespace = ? AND name = ?')
      .get(kind, key.namespace, key.name) as ResourceRow | undefined;
  }

  private decode<K extends ResourceKind>(kind: K, row: ResourceRow): ResourceMap[K] {
    return RESOURCE_SCHEMAS[kind].parse(JSON.parse(row.body));
  }

  private decodeAny(row: ResourceRow): AnyResource {
    if (!isResourceKind(row.kind)) {
      throw new Error(`unknown resource kind '${row.kind}' in store`);
    }
    return this.decode(row.kind, row);
  }

  private validate(obj: AnyResource): void {
    const result = RESOURCE_SCHEMAS[obj.kind].safeParse(obj);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`invalid ${obj.kind} "${objectKey(obj.metadata)}": ${issues}`);
    }
  }

  private nextResourceVersion(): number {
    this.db
      .prepare(
        `INSERT INTO resource_meta (key, value) VALUES ('resource_version', 1)
         ON CONFLICT(key) DO UPDATE SET value = value + 1`,
      )
      .run();
    const row = this.db
      .prepare(`SELECT value FROM resource_meta WHERE key = 'resource_version'`)
      .get() as { value: number };
    return row.value;
  }

  /** Mark for deletion when finalizers remain, otherwise remove. Runs inside a transaction. */
  private deleteRow(row: ResourceRow, events: WatchEvent[]): void {
    const obj = this.decodeAny(row);
    if ((obj.metadata.finalizers ?? []).length > 0) {
      if (!obj.metadata.deletionTimestamp) {
        const version = this.nextResourceVersion();
        const marked = {
          ...obj,
          metadata: { ...obj.metadata, deletionTimestamp: this.now().toISOString(), resourceVersion: String(version) },
        };
        this.db
          .prepare('UPDATE resources SET resource_version = ?, body = ? WHERE uid = ?')
          .run(version, JSON.stringify(marked), row.uid);
        events.push({ type: 'MODIFIED', kind: marked.kind, object: marked });
      }
      return;
    }
    this.removeRow(row, obj, events);
  }

  /** Physically remove a row and cascade to its dependents. Runs inside a transaction. */
  private removeRow(row: ResourceRow, obj: AnyResource, events: WatchEvent[]): void {
    this.db.prepare('DELETE FROM resources WHERE uid = ?').run(row.uid);
    events.push({ type: 'DELETED', kind: obj.kind, object: obj });

    const candidates = this.db
      .prepare('SELECT * FROM resources WHERE namespace = ?')
      .all(row.namespace) as ResourceRow[];
    for (const candidate of candidates) {
      const dependent = this.decodeAny(candidate);
      const owned = (dependent.metadata.ownerReferences ?? []).some((ref) => ref.uid === row.uid);
      if (owned) {
        this.deleteRow(candidate, events);
      }
    }
  }

  private emit(events: WatchEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (listenerErr) {
          console.error('[ResourceStore] Watch listener threw an error:', listenerErr);
        }
      }
    }
  }
}
