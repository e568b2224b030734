import type { FastifyPluginAsync, FastifySchema, FastifySchemaCompiler } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE } from "@itemgate/schemas";
import {
  CreateItemBodySchema,
  ReplaceItemBodySchema,
  ListItemsQuerySchema,
  ItemIdParamsSchema,
  issuesToProblems,
  parseItemDraft,
} from "../validation.js";

const createItemJsonSchema = zodToJsonSchema(CreateItemBodySchema, { target: "openApi3" });
const replaceItemJsonSchema = zodToJsonSchema(ReplaceItemBodySchema, { target: "openApi3" });

const idParams = {
  type: "object",
  properties: { id: { type: "integer" } },
  required: ["id"],
};

const security = [{ apiKey: [] }];

// Route schemas that only document the payload for OpenAPI; the handler
// parses the request itself.
const documentOnly: FastifySchemaCompiler<FastifySchema> = () => () => true;

export const itemsRoutes: FastifyPluginAsync = async (app) => {
  // GET /v1/items?page=1&pageSize=2
  app.get("/", {
    config: { rateLimited: true },
    schema: {
      description: "List items in insertion order, one page at a time.",
      tags: ["Items"],
      security,
      querystring: {
        type: "object",
        properties: {
          page: { type: "integer", default: DEFAULT_PAGE },
          pageSize: { type: "integer", default: DEFAULT_PAGE_SIZE },
        },
      },
    },
  }, async (request, reply) => {
    const parsed = ListItemsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Invalid pagination parameters",
        statusCode: 400,
        errors: issuesToProblems(parsed.error.issues),
      });
    }

    const page = app.itemStore.list(parsed.data.page, parsed.data.pageSize);
    return reply.code(200).send(page);
  });

  // GET /v1/items/:id
  app.get("/:id", {
    config: { rateLimited: true },
    schema: {
      description: "Get an item by ID.",
      tags: ["Items"],
      security,
      params: idParams,
    },
  }, async (request, reply) => {
    const { id } = ItemIdParamsSchema.parse(request.params);
    return reply.code(200).send(app.itemStore.get(id));
  });

  // POST /v1/items
  // parseItemDraft reports every problem with the draft at once.
  app.post("/", {
    config: { rateLimited: true },
    validatorCompiler: documentOnly,
    schema: {
      description: "Create an item. The server assigns its ID.",
      tags: ["Items"],
      security,
      body: createItemJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = parseItemDraft(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Validation failed",
        statusCode: 400,
        errors: parsed.problems,
      });
    }

    const item = app.itemStore.create(parsed.draft);
    return reply.code(201).header("location", `/v1/items/${item.id}`).send(item);
  });

  // PUT /v1/items/:id
  app.put("/:id", {
    config: { rateLimited: true },
    validatorCompiler: documentOnly,
    schema: {
      description: "Replace an item's name and price. Its ID and position are kept.",
      tags: ["Items"],
      security,
      params: idParams,
      body: replaceItemJsonSchema,
    },
  }, async (request, reply) => {
    const params = ItemIdParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({
        error: "Invalid item ID",
        statusCode: 400,
        errors: issuesToProblems(params.error.issues),
      });
    }
    const { id } = params.data;

    // An unknown id is a 404 whatever the body holds.
    app.itemStore.get(id);

    const parsed = parseItemDraft(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Validation failed",
        statusCode: 400,
        errors: parsed.problems,
      });
    }

    return reply.code(200).send(app.itemStore.update(id, parsed.draft));
  });

  // DELETE /v1/items/:id
  app.delete("/:id", {
    config: { rateLimited: true },
    schema: {
      description: "Delete an item by ID.",
      tags: ["Items"],
      security,
      params: idParams,
    },
  }, async (request, reply) => {
    const { id } = ItemIdParamsSchema.parse(request.params);
    app.itemStore.delete(id);
    return reply.code(204).send();
  });
};
