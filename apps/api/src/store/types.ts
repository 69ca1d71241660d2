import type {
  CreditLedgerEntry,
  Job,
  Project,
  ProjectFile,
  SystemSetting,
  User,
  UserAiProvider,
} from "@crewforge/types";

// ─── Gateway de persistencia (documentos por id) ───────────────────
// El orchestrator y el ledger solo dependen de esta forma, no del motor.

/** Filtro por igualdad de campos. */
export type Filter<T> = Partial<T>;

export interface FindOptions<T> {
  sort?: { field: keyof T & string; direction: "asc" | "desc" };
  limit?: number;
  skip?: number;
}

export interface Collection<T extends object> {
  readonly name: string;
  findOne(filter: Filter<T>): Promise<T | null>;
  findMany(filter: Filter<T>, options?: FindOptions<T>): Promise<T[]>;
  insertOne(doc: T): Promise<T>;
  /**
   * Actualiza el primer documento que matchea. Devuelve cuantos matchearon (0 o 1),
   * asi un filtro con el valor leido funciona como compare-and-set.
   */
  updateOne(filter: Filter<T>, patch: Partial<T>): Promise<number>;
  deleteOne(filter: Filter<T>): Promise<number>;
  deleteMany(filter: Filter<T>): Promise<number>;
  count(filter: Filter<T>): Promise<number>;
}

export interface Store {
  jobs: Collection<Job>;
  projects: Collection<Project>;
  projectFiles: Collection<ProjectFile>;
  users: Collection<User>;
  userAiProviders: Collection<UserAiProvider>;
  creditHistory: Collection<CreditLedgerEntry>;
  systemSettings: Collection<SystemSetting>;
}

/** Nombre de tabla/coleccion por cada entrada del Store. */
export const COLLECTION_NAMES: Record<keyof Store, string> = {
  jobs: "jobs",
  projects: "projects",
  projectFiles: "project_files",
  users: "users",
  userAiProviders: "user_ai_providers",
  creditHistory: "credit_history",
  systemSettings: "system_settings",
};

/** Copia los campos definidos de un filtro/patch a un record plano. */
export function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
