import type { Collection, Filter, FindOptions, Store } from "./types.js";
import { COLLECTION_NAMES, toRecord } from "./types.js";

// ─── Store en memoria ───────────────────────────────────────────────
// Mismo contrato que el de Supabase. Se usa en tests y en modo dev sin DB.
// Cada operacion corre sincronica dentro de su promise: el compare-and-set
// de updateOne es atomico respecto de otras operaciones.

function matches(doc: object, filter: Record<string, unknown>): boolean {
  const record = toRecord(doc);
  return Object.entries(filter).every(([key, value]) => record[key] === value);
}

function compare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a ?? "").localeCompare(String(b ?? ""));
}

export class MemoryCollection<T extends object> implements Collection<T> {
  readonly name: string;
  private docs: T[] = [];

  constructor(name: string, seed: T[] = []) {
    this.name = name;
    this.docs = seed.map((d) => structuredClone(d));
  }

  async findOne(filter: Filter<T>): Promise<T | null> {
    const f = toRecord(filter);
    const found = this.docs.find((d) => matches(d, f));
    return found ? structuredClone(found) : null;
  }

  async findMany(filter: Filter<T>, options: FindOptions<T> = {}): Promise<T[]> {
    const f = toRecord(filter);
    let result = this.docs.filter((d) => matches(d, f));

    if (options.sort) {
      const { field, direction } = options.sort;
      const sign = direction === "asc" ? 1 : -1;
      result = [...result].sort((a, b) => sign * compare(a[field], b[field]));
    }

    const skip = options.skip ?? 0;
    const end = options.limit !== undefined ? skip + options.limit : undefined;
    return result.slice(skip, end).map((d) => structuredClone(d));
  }

  async insertOne(doc: T): Promise<T> {
    this.docs.push(structuredClone(doc));
    return structuredClone(doc);
  }

  async updateOne(filter: Filter<T>, patch: Partial<T>): Promise<number> {
    const f = toRecord(filter);
    const index = this.docs.findIndex((d) => matches(d, f));
    if (index < 0) return 0;
    this.docs[index] = { ...this.docs[index], ...structuredClone(patch) };
    return 1;
  }

  async deleteOne(filter: Filter<T>): Promise<number> {
    const f = toRecord(filter);
    const index = this.docs.findIndex((d) => matches(d, f));
    if (index < 0) return 0;
    this.docs.splice(index, 1);
    return 1;
  }

  async deleteMany(filter: Filter<T>): Promise<number> {
    const f = toRecord(filter);
    const before = this.docs.length;
    this.docs = this.docs.filter((d) => !matches(d, f));
    return before - this.docs.length;
  }

  async count(filter: Filter<T>): Promise<number> {
    const f = toRecord(filter);
    return this.docs.filter((d) => matches(d, f)).length;
  }
}

export function createMemoryStore(): Store {
  return {
    jobs: new MemoryCollection(COLLECTION_NAMES.jobs),
    projects: new MemoryCollection(COLLECTION_NAMES.projects),
    projectFiles: new MemoryCollection(COLLECTION_NAMES.projectFiles),
    users: new MemoryCollection(COLLECTION_NAMES.users),
    userAiProviders: new MemoryCollection(COLLECTION_NAMES.userAiProviders),
    creditHistory: new MemoryCollection(COLLECTION_NAMES.creditHistory),
    systemSettings: new MemoryCollection(COLLECTION_NAMES.systemSettings),
  };
}
