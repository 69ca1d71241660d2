import type { SupabaseClient } from "@supabase/supabase-js";
import { StoreError } from "../errors.js";
import type { Collection, Filter, FindOptions, Store } from "./types.js";
import { COLLECTION_NAMES, toRecord } from "./types.js";

// ─── Store sobre Supabase (PostgREST) ───────────────────────────────
// Cada coleccion es una tabla; tasks vive embebido en jobs como jsonb.

export class SupabaseCollection<T extends object> implements Collection<T> {
  readonly name: string;
  private readonly db: SupabaseClient;

  constructor(db: SupabaseClient, name: string) {
    this.db = db;
    this.name = name;
  }

  async findOne(filter: Filter<T>): Promise<T | null> {
    const { data, error } = await this.db
      .from(this.name)
      .select("*")
      .match(toRecord(filter))
      .limit(1)
      .maybeSingle();

    if (error) throw new StoreError("findOne", this.name, error.message);
    return (data as T | null) ?? null;
  }

  async findMany(filter: Filter<T>, options: FindOptions<T> = {}): Promise<T[]> {
    let query = this.db.from(this.name).select("*").match(toRecord(filter));

    if (options.sort) {
      query = query.order(options.sort.field, { ascending: options.sort.direction === "asc" });
    }
    if (options.limit !== undefined) {
      const skip = options.skip ?? 0;
      query = query.range(skip, skip + options.limit - 1);
    } else if (options.skip) {
      query = query.range(options.skip, Number.MAX_SAFE_INTEGER);
    }

    const { data, error } = await query;
    if (error) throw new StoreError("findMany", this.name, error.message);
    return (data as T[]) ?? [];
  }

  async insertOne(doc: T): Promise<T> {
    const { data, error } = await this.db.from(this.name).insert(toRecord(doc)).select().single();
    if (error) throw new StoreError("insertOne", this.name, error.message);
    return data as T;
  }

  async updateOne(filter: Filter<T>, patch: Partial<T>): Promise<number> {
    // PostgREST no tiene "update limit 1": los filtros usados siempre incluyen la PK.
    const { data, error } = await this.db
      .from(this.name)
      .update(toRecord(patch))
      .match(toRecord(filter))
      .select("*");

    if (error) throw new StoreError("updateOne", this.name, error.message);
    return (data ?? []).length;
  }

  async deleteOne(filter: Filter<T>): Promise<number> {
    return this.deleteMany(filter);
  }

  async deleteMany(filter: Filter<T>): Promise<number> {
    const { data, error } = await this.db.from(this.name).delete().match(toRecord(filter)).select("*");
    if (error) throw new StoreError("delete", this.name, error.message);
    return (data ?? []).length;
  }

  async count(filter: Filter<T>): Promise<number> {
    const { count, error } = await this.db
      .from(this.name)
      .select("*", { count: "exact", head: true })
      .match(toRecord(filter));

    if (error) throw new StoreError("count", this.name, error.message);
    return count ?? 0;
  }
}

export function createSupabaseStore(db: SupabaseClient): Store {
  return {
    jobs: new SupabaseCollection(db, COLLECTION_NAMES.jobs),
    projects: new SupabaseCollection(db, COLLECTION_NAMES.projects),
    projectFiles: new SupabaseCollection(db, COLLECTION_NAMES.projectFiles),
    users: new SupabaseCollection(db, COLLECTION_NAMES.users),
    userAiProviders: new SupabaseCollection(db, COLLECTION_NAMES.userAiProviders),
    creditHistory: new SupabaseCollection(db, COLLECTION_NAMES.creditHistory),
    systemSettings: new SupabaseCollection(db, COLLECTION_NAMES.systemSettings),
  };
}
