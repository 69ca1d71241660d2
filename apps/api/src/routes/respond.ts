import type { FastifyReply, FastifyRequest } from "fastify";
import type { ApiResponse } from "@crewforge/types";
import { AppError, InsufficientCreditsError } from "../errors.js";
import type { Services } from "../services.js";

export interface RouteOptions {
  services: Services;
}

export interface CreditShortfall {
  required: number;
  available: number;
}

/** AppError → su status + envelope; el resto es 500 sin detalle. */
export function errorResponse(request: FastifyRequest, reply: FastifyReply, err: unknown): ApiResponse<never> {
  if (err instanceof AppError) {
    request.log.warn({ code: err.code }, err.message);
    reply.code(err.statusCode);
    return { ok: false, error: err.message };
  }

  request.log.error(err, "Unhandled route error");
  reply.code(500);
  return { ok: false, error: "Internal server error" };
}

/** 402 con required/available para que el cliente muestre cuanto falta. */
export function shortfallResponse(reply: FastifyReply, err: InsufficientCreditsError): ApiResponse<CreditShortfall> {
  reply.code(402);
  return { ok: false, error: err.message, data: { required: err.required, available: err.available } };
}
