import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ApiDeps } from "./types.js";

const listQuerySchema = z.object({
  page: z.coerce.number().int().positive().optional(),
  per_page: z.coerce.number().int().positive().max(100).optional(),
  view_id: z.coerce.number().int().positive().optional(),
  include: z.string().trim().min(1).optional()
});

const collectQuerySchema = z.object({
  max_pages: z.coerce.number().int().positive().optional()
});

const includeQuerySchema = z.object({
  include: z.string().trim().min(1).optional()
});

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive()
});

function parseListQuery(query: unknown) {
  const parsed = listQuerySchema.parse(query ?? {});
  return {
    page: parsed.page,
    perPage: parsed.per_page,
    viewId: parsed.view_id,
    include: parsed.include
  };
}

export async function registerRoutes(app: FastifyInstance, deps: ApiDeps): Promise<void> {
  app.get("/contacts", async (request) => {
    const result = await deps.freshworks.contacts.list(parseListQuery(request.query));
    return { ok: true, ...result };
  });

  app.get("/contacts/all", async (request) => {
    const { max_pages } = collectQuerySchema.parse(request.query ?? {});
    const contacts = await deps.freshworks.contacts.listAll(max_pages ?? deps.env.maxPages);
    return { ok: true, count: contacts.length, contacts };
  });

  app.get("/contacts/:id", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { include } = includeQuerySchema.parse(request.query ?? {});
    const result = await deps.freshworks.contacts.get(id, include);
    return { ok: true, ...result };
  });

  app.get("/deals", async (request) => {
    const result = await deps.freshworks.deals.list(parseListQuery(request.query));
    return { ok: true, ...result };
  });

  app.get("/deals/all", async (request) => {
    const { max_pages } = collectQuerySchema.parse(request.query ?? {});
    const deals = await deps.freshworks.deals.listAll(max_pages ?? deps.env.maxPages);
    return { ok: true, count: deals.length, deals };
  });

  app.get("/deals/:id", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { include } = includeQuerySchema.parse(request.query ?? {});
    const result = await deps.freshworks.deals.get(id, include);
    return { ok: true, ...result };
  });
}
