import type { FastifyReply, FastifyRequest, onRequestAsyncHookHandler } from "fastify";

const READ_METHODS = new Set(["GET", "OPTIONS", "HEAD"]);

/** /jobs/:id/execute es GET pero gasta creditos: se protege igual que las mutantes. */
function isProtected(request: FastifyRequest): boolean {
  if (!READ_METHODS.has(request.method)) return true;
  return request.url.split("?")[0].endsWith("/execute");
}

/**
 * Hook onRequest: si hay API_TOKEN exige `Authorization: Bearer <token>` en
 * las rutas protegidas. Sin token configurado permite todo (modo dev).
 */
export function createAuthHook(apiToken: string | undefined): onRequestAsyncHookHandler {
  return async function requireToken(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    if (!apiToken || !isProtected(request)) return;

    const authHeader = request.headers.authorization;
    if (!authHeader) {
      return reply.code(401).send({ ok: false, error: "Authorization header required" });
    }

    const match = authHeader.match(/^Bearer\s+(.+)$/i);
    if (!match || match[1] !== apiToken) {
      return reply.code(401).send({ ok: false, error: "Invalid token" });
    }
  };
}
