import type { FastifyReply, FastifyRequest } from "fastify";
import type { User } from "@crewforge/types";
import type { Store } from "./store/types.js";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type CallerLookup = { ok: true; user: User } | { ok: false; error: string };

/** Lee X-User-Id y valida formato UUID. null si falta o es invalido. */
export function getUserId(request: FastifyRequest): string | null {
  const header = request.headers["x-user-id"];
  if (typeof header !== "string" || !UUID_RE.test(header)) return null;
  return header;
}

/** Carga el usuario del header. Si falta o no existe deja 401 en el reply. */
export async function requireUser(request: FastifyRequest, reply: FastifyReply, store: Store): Promise<CallerLookup> {
  const userId = getUserId(request);
  if (!userId) {
    reply.code(401);
    return { ok: false, error: "X-User-Id header required (valid UUID)" };
  }

  const user = await store.users.findOne({ id: userId });
  if (!user) {
    reply.code(401);
    return { ok: false, error: "Unknown user" };
  }
  return { ok: true, user };
}
