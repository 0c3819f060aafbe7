import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { logDebug, logInfo, logTrace } from "./logger.js";

export type RequestTraceMode = "off" | "debug" | "trace";

const requestTraceStartTimes = new WeakMap<FastifyRequest, number>();

export const resolveRequestTraceMode = (rawMode: string | undefined = process.env.BACKEND_REQUEST_TRACE_MODE): RequestTraceMode => {
  const explicit = rawMode?.trim().toLowerCase();
  if (explicit === "debug" || explicit === "trace") {
    return explicit;
  }
  return "off";
};

// Never echo the api key header.
const pickRequestHeaders = (request: FastifyRequest): Record<string, unknown> => {
  const headers = request.headers;
  return {
    origin: headers.origin ?? null,
    host: headers.host ?? null,
    "user-agent": headers["user-agent"] ?? null,
    "content-type": headers["content-type"] ?? null,
    "content-length": headers["content-length"] ?? null,
    "x-request-id": headers["x-request-id"] ?? null,
    "x-api-key": headers["x-api-key"] ? "[present]" : null
  };
};

const summarizeBody = (body: unknown): Record<string, unknown> | null => {
  if (body === undefined) {
    return null;
  }
  if (body === null) {
    return { type: "null" };
  }
  if (typeof body === "string") {
    return { type: "string", length: body.length };
  }
  if (Array.isArray(body)) {
    return { type: "array", length: body.length };
  }
  if (typeof body === "object") {
    const keys = Object.keys(body);
    return {
      type: "object",
      key_count: keys.length,
      keys: keys.slice(0, 20)
    };
  }
  return { type: typeof body };
};

const traceRequest = (
  mode: Exclude<RequestTraceMode, "off">,
  request: FastifyRequest,
  reply: FastifyReply,
  event: string,
  fields: Record<string, unknown> = {}
): void => {
  const baseFields: Record<string, unknown> = {
    method: request.method,
    url: request.url,
    route: request.routeOptions.url ?? null,
    status_code: reply.statusCode || null,
    ...fields
  };

  if (mode === "trace") {
    logTrace(event, { requestId: request.id }, baseFields);
    return;
  }

  logDebug(event, { requestId: request.id }, baseFields);
};

export const registerRequestTraceHooks = (app: FastifyInstance, mode: RequestTraceMode = resolveRequestTraceMode()): void => {
  if (mode === "off") {
    return;
  }

  logInfo("http.trace.enabled", {}, { mode });

  app.addHook("onRequest", async (request, reply) => {
    requestTraceStartTimes.set(request, Date.now());
    traceRequest(mode, request, reply, "http.request.start", {
      headers: pickRequestHeaders(request)
    });
  });

  if (mode === "trace") {
    app.addHook("preHandler", async (request, reply) => {
      traceRequest(mode, request, reply, "http.request.pre_handler", {
        body: summarizeBody(request.body)
      });
    });
  }

  app.addHook("onError", async (request, reply, error) => {
    traceRequest(mode, request, reply, "http.request.error", {
      error_name: error.name,
      error_message: error.message
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = requestTraceStartTimes.get(request) ?? Date.now();
    traceRequest(mode, request, reply, "http.request.complete", {
      duration_ms: Date.now() - startedAt
    });
  });
};
