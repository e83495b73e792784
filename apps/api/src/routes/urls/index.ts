/**
 * Short URL Routes
 *
 * Endpoints:
 *   POST   /urls          - Create a short URL (API key)
 *   GET    /urls          - List the caller's short URLs (API key)
 *   GET    /urls/check    - Check custom identifier availability
 *   GET    /urls/:id      - Record and statistics (API key, owner)
 *   PUT    /urls/:id      - Partial update (API key, owner)
 *   DELETE /urls/:id      - Soft delete (API key, owner)
 *   GET    /urls/:id/qr   - Redirect to a QR image of the short URL
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { LIST_CONFIG, buildQrImageUrl, clampQrSize } from "@tinyhop/shared";
import type { ResolutionService } from "@tinyhop/core";
import { fromZodError } from "../../errors.js";
import { callOptions } from "../../middleware/request-signal.js";
import { presentAvailability, presentList, presentUrl } from "../../presenters.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const isoDate = z
  .string()
  .datetime({ offset: true, message: "must be an ISO 8601 timestamp" })
  .transform((value) => new Date(value));

const createUrlSchema = z.object({
  original_url: z.string({ required_error: "is required" }),
  custom_id: z.string().nullish(),
  description: z.string().nullish(),
  expires_at: isoDate.nullish(),
});

const updateUrlSchema = z.object({
  original_url: z.string().optional(),
  description: z.string().nullable().optional(),
  expires_at: isoDate.nullable().optional(),
  is_active: z.boolean().optional(),
});

const listQuerySchema = z.object({
  page: z.coerce.number().int().optional(),
  limit: z.coerce.number().int().optional(),
  sort: z.enum(LIST_CONFIG.SORT_FIELDS).optional(),
  order: z.enum(LIST_CONFIG.SORT_ORDERS).optional(),
  is_active: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

const checkQuerySchema = z.object({
  id: z.string({ required_error: "is required" }).min(1, "is required"),
});

interface IdParams {
  id: string;
}

export interface UrlsRoutesOptions {
  service: ResolutionService;
  qrGeneratorUrl: string;
}

const apiKeySecurity = [{ apiKey: [] }];

// ============================================================================
// Route Registration
// ============================================================================

export async function urlsRoutes(fastify: FastifyInstance, options: UrlsRoutesOptions): Promise<void> {
  const { service, qrGeneratorUrl } = options;

  fastify.post(
    "/urls",
    {
      preHandler: fastify.authenticate,
      schema: {
        summary: "Create a short URL",
        tags: ["urls"],
        security: apiKeySecurity,
      },
    },
    async (request, reply) => {
      const parsed = createUrlSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, "body");
      }

      const { original_url, custom_id, description, expires_at } = parsed.data;
      const view = await service.create(
        {
          originalUrl: original_url,
          customId: custom_id,
          description,
          expiresAt: expires_at,
        },
        request.ownerKey,
        callOptions(request)
      );

      return reply.status(201).send({ success: true, data: presentUrl(view) });
    }
  );

  fastify.get(
    "/urls",
    {
      preHandler: fastify.authenticate,
      schema: {
        summary: "List short URLs created with the caller's API key",
        tags: ["urls"],
        security: apiKeySecurity,
      },
    },
    async (request) => {
      const parsed = listQuerySchema.safeParse(request.query ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, "query");
      }

      const { page, limit, sort, order, is_active } = parsed.data;
      const result = await service.list(
        request.ownerKey,
        { page, limit, sort, order, isActive: is_active },
        callOptions(request)
      );

      return { success: true, data: presentList(result) };
    }
  );

  // Registered before /urls/:id so "check" is never taken for an id
  fastify.get(
    "/urls/check",
    {
      schema: {
        summary: "Check whether a custom identifier can be claimed",
        tags: ["urls"],
      },
    },
    async (request) => {
      const parsed = checkQuerySchema.safeParse(request.query ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, "id");
      }

      const result = await service.checkAvailability(parsed.data.id, callOptions(request));
      return { success: true, data: presentAvailability(parsed.data.id.trim(), result) };
    }
  );

  fastify.get<{ Params: IdParams }>(
    "/urls/:id",
    {
      preHandler: fastify.authenticate,
      schema: {
        summary: "Short URL record with click statistics",
        tags: ["urls"],
        security: apiKeySecurity,
      },
    },
    async (request) => {
      const view = await service.getStats(request.params.id, request.ownerKey, callOptions(request));
      return { success: true, data: presentUrl(view) };
    }
  );

  fastify.put<{ Params: IdParams }>(
    "/urls/:id",
    {
      preHandler: fastify.authenticate,
      schema: {
        summary: "Update a short URL; null clears description and expires_at",
        tags: ["urls"],
        security: apiKeySecurity,
      },
    },
    async (request) => {
      const parsed = updateUrlSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, "body");
      }

      const { original_url, description, expires_at, is_active } = parsed.data;
      const view = await service.update(
        request.params.id,
        {
          originalUrl: original_url,
          description,
          expiresAt: expires_at,
          isActive: is_active,
        },
        request.ownerKey,
        callOptions(request)
      );

      return { success: true, data: presentUrl(view) };
    }
  );

  fastify.delete<{ Params: IdParams }>(
    "/urls/:id",
    {
      preHandler: fastify.authenticate,
      schema: {
        summary: "Soft delete a short URL",
        tags: ["urls"],
        security: apiKeySecurity,
      },
    },
    async (request, reply) => {
      await service.delete(request.params.id, request.ownerKey, callOptions(request));
      return reply.status(204).send();
    }
  );

  fastify.get<{ Params: IdParams; Querystring: { size?: string } }>(
    "/urls/:id/qr",
    {
      schema: {
        summary: "Redirect to a QR code image of the short URL",
        tags: ["qr"],
      },
    },
    async (request, reply) => {
      const view = await service.resolve(request.params.id, callOptions(request));

      const raw = request.query.size;
      const size = clampQrSize(raw === undefined || raw === "" ? undefined : Number(raw));

      return reply.redirect(301, buildQrImageUrl(view.shortUrl, size, qrGeneratorUrl));
    }
  );
}
