/**
 * REST routes under /api/v1.
 *
 * Handlers validate request bodies against schema/requests.schema.json and
 * answer `{ success, data }`. Errors map to status codes in one place.
 */

import type { SchemaObject } from "ajv";

import requestsSchema from "../../schema/requests.schema.json";
import { NotFoundError, RequestValidationError, errorMessage } from "../shared/errors";
import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import type { DeviceInput, LinkInput, LinkUpdate, ProjectInput } from "../shared/types/topology";
import { assertValid, compileSchema } from "../shared/utilities/schemaValidation";

import type { ApiDependencies, ApiReply, ApiRequest, Route, RouteParams } from "./types";

export const API_PREFIX = "/api/v1";

const { definitions } = requestsSchema;

function definitionSchema(name: keyof typeof definitions): SchemaObject {
  return { definitions, ...definitions[name] };
}

const validateProjectInput = compileSchema<ProjectInput>(definitionSchema("projectInput"));
const validateDeviceInput = compileSchema<DeviceInput>(definitionSchema("deviceInput"));
const validateLinkInput = compileSchema<LinkInput>(definitionSchema("linkInput"));
const validateLinkUpdate = compileSchema<LinkUpdate>(definitionSchema("linkUpdate"));
const validateConfigUpload = compileSchema<{ content: string }>(definitionSchema("configUpload"));

function ok(data: unknown, status = 200): ApiReply {
  return { status, body: { success: true, data } };
}

function param(params: RouteParams, name: string): string {
  const value = params[name];
  if (value === undefined) throw new RequestValidationError(`Missing path parameter "${name}"`);
  return value;
}

// ============================================================================
// Route table
// ============================================================================

export function createRoutes(deps: ApiDependencies): Route[] {
  const { store, ingest, validator, topology } = deps;

  return [
    {
      method: "GET",
      path: "/health",
      handler: async () => ok({ status: "ok" })
    },

    // Projects
    {
      method: "GET",
      path: `${API_PREFIX}/projects`,
      handler: async () => ok(await store.listProjects())
    },
    {
      method: "POST",
      path: `${API_PREFIX}/projects`,
      handler: async (_params, body) =>
        ok(await store.createProject(assertValid(validateProjectInput, body, "project")), 201)
    },
    {
      method: "GET",
      path: `${API_PREFIX}/projects/:projectId`,
      handler: async (params) => ok(await store.getProject(param(params, "projectId")))
    },
    {
      method: "DELETE",
      path: `${API_PREFIX}/projects/:projectId`,
      handler: async (params) => {
        const revalidated = await topology.deleteProject(param(params, "projectId"));
        return ok({ status: "success", links: revalidated.map((r) => r.link) });
      }
    },

    // Devices
    {
      method: "GET",
      path: `${API_PREFIX}/projects/:projectId/devices`,
      handler: async (params) => ok(await store.listDevices(param(params, "projectId")))
    },
    {
      method: "POST",
      path: `${API_PREFIX}/projects/:projectId/devices`,
      handler: async (params, body) =>
        ok(
          await store.createDevice(param(params, "projectId"), assertValid(validateDeviceInput, body, "device")),
          201
        )
    },
    {
      method: "GET",
      path: `${API_PREFIX}/devices/:deviceId`,
      handler: async (params) => ok(await store.getDevice(param(params, "deviceId")))
    },
    {
      method: "DELETE",
      path: `${API_PREFIX}/devices/:deviceId`,
      handler: async (params) => {
        const revalidated = await topology.deleteDevice(param(params, "deviceId"));
        return ok({ status: "success", links: revalidated.map((r) => r.link) });
      }
    },

    // Links
    {
      method: "GET",
      path: `${API_PREFIX}/projects/:projectId/links`,
      handler: async (params) => ok(await store.listLinks(param(params, "projectId")))
    },
    {
      method: "POST",
      path: `${API_PREFIX}/projects/:projectId/links`,
      handler: async (params, body) => {
        const input = assertValid(validateLinkInput, body, "link");
        const result = await topology.createLink(param(params, "projectId"), input);
        return ok(result.link, 201);
      }
    },
    {
      method: "PATCH",
      path: `${API_PREFIX}/links/:linkId`,
      handler: async (params, body) => {
        const update = assertValid(validateLinkUpdate, body, "link update");
        return ok((await topology.updateLink(param(params, "linkId"), update)).link);
      }
    },
    {
      method: "DELETE",
      path: `${API_PREFIX}/links/:linkId`,
      handler: async (params) => {
        await store.deleteLink(param(params, "linkId"));
        return ok({ status: "success" });
      }
    },
    {
      method: "POST",
      path: `${API_PREFIX}/links/:linkId/validate`,
      handler: async (params) => ok(await validator.validate(param(params, "linkId")))
    },

    // Configurations
    {
      method: "POST",
      path: `${API_PREFIX}/configs/:deviceId`,
      handler: async (params, body) => {
        const upload = assertValid(validateConfigUpload, body, "configuration upload");
        const result = await ingest.ingest(param(params, "deviceId"), upload.content);
        return ok(
          {
            config: result.snapshot,
            facts: result.facts,
            links: result.links.map((r) => ({ id: r.link.id, state: r.link.state, reason: r.evaluation.reason }))
          },
          201
        );
      }
    },
    {
      method: "GET",
      path: `${API_PREFIX}/configs/:deviceId/latest`,
      handler: async (params) => ok(await store.getLatestConfig(param(params, "deviceId")))
    },
    {
      method: "POST",
      path: `${API_PREFIX}/configs/:deviceId/reextract`,
      handler: async (params) => {
        const result = await ingest.reextract(param(params, "deviceId"));
        return ok({ facts: result.facts, links: result.links.map((r) => r.link) });
      }
    }
  ];
}

// ============================================================================
// Matching and dispatch
// ============================================================================

/**
 * Match a concrete path against a template; returns the decoded parameters.
 */
export function matchPath(template: string, path: string): RouteParams | undefined {
  const templateParts = template.split("/").filter(Boolean);
  const pathParts = path.split("/").filter(Boolean);
  if (templateParts.length !== pathParts.length) return undefined;

  const params: RouteParams = {};
  for (const [index, part] of templateParts.entries()) {
    const actual = pathParts[index];
    if (part.startsWith(":")) {
      try {
        params[part.slice(1)] = decodeURIComponent(actual);
      } catch {
        return undefined;
      }
    } else if (part !== actual) {
      return undefined;
    }
  }
  return params;
}

function errorReply(err: unknown, logger: IOLogger): ApiReply {
  if (err instanceof NotFoundError) {
    return { status: 404, body: { success: false, error: err.message } };
  }
  if (err instanceof RequestValidationError) {
    return { status: 400, body: { success: false, error: err.message, details: err.details } };
  }
  logger.error(`Request failed: ${errorMessage(err)}`);
  return { status: 500, body: { success: false, error: errorMessage(err) } };
}

/**
 * Build the request dispatcher for a route table.
 */
export function createApiHandler(
  routes: Route[],
  logger: IOLogger = noopLogger
): (request: ApiRequest) => Promise<ApiReply> {
  return async (request) => {
    const candidates = routes
      .map((route) => ({ route, params: matchPath(route.path, request.path) }))
      .filter((c): c is { route: Route; params: RouteParams } => c.params !== undefined);

    if (candidates.length === 0) {
      return { status: 404, body: { success: false, error: `No route for ${request.path}` } };
    }

    const method = request.method.toUpperCase();
    const match = candidates.find((c) => c.route.method === method);
    if (!match) {
      return { status: 405, body: { success: false, error: `Method ${method} not allowed on ${request.path}` } };
    }

    try {
      return await match.route.handler(match.params, request.body);
    } catch (err) {
      return errorReply(err, logger);
    }
  };
}
