import fastify, { type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { isFreshworksRequestError } from "@crm-relay/freshworks";
import type { ApiDeps } from "./types.js";
import { registerRoutes } from "./routes.js";

export async function createServer(deps: ApiDeps): Promise<FastifyInstance> {
  const app = fastify({
    logger: false
  });

  app.setErrorHandler<Error>(async (error, request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400);
      return { ok: false, error: "invalid_request", issues: error.issues.map((issue) => issue.message) };
    }

    if (isFreshworksRequestError(error)) {
      deps.logger.warn(
        { method: request.method, url: request.url, status: error.status, path: error.path },
        "Freshworks request failed"
      );
      if (error.status === 404) {
        reply.code(404);
        return { ok: false, error: "not_found" };
      }
      reply.code(502);
      return { ok: false, error: "upstream_error", status: error.status };
    }

    deps.logger.error({ method: request.method, url: request.url, err: error.message }, "Request failed");
    reply.code(500);
    return { ok: false, error: "internal_error" };
  });

  await registerRoutes(app, deps);

  app.get("/health", async () => {
    const freshworksReachable = await deps.freshworks.contacts
      .list({ perPage: 1 })
      .then(() => true)
      .catch(() => false);

    return {
      ok: freshworksReachable,
      subsystems: {
        freshworksReachable
      }
    };
  });

  return app;
}
