/**
 * Application assembly: store, services, routes and HTTP server.
 */

import type * as http from "http";

import type { Settings } from "../config/settings";
import { createScopedLogger } from "../logging/logger";
import { FactsIngestService, LinkValidationService, TopologyService } from "../services";
import { TopologyStore, nodeFsAdapter } from "../shared/io";
import type { FileSystemAdapter } from "../shared/io";
import { KeyedLock } from "../shared/utilities/KeyedLock";

import { createHttpServer } from "./httpServer";
import { createApiHandler, createRoutes } from "./routes";
import type { ApiDependencies, ApiReply, ApiRequest } from "./types";

export interface Application extends ApiDependencies {
  dispatch: (request: ApiRequest) => Promise<ApiReply>;
  server: http.Server;
}

export function createApplication(settings: Settings, fs: FileSystemAdapter = nodeFsAdapter): Application {
  const store = new TopologyStore({
    fs,
    dataDir: settings.dataDir,
    logger: createScopedLogger("TopologyStore")
  });
  const validator = new LinkValidationService({ store, logger: createScopedLogger("LinkValidation") });
  const deviceLocks = new KeyedLock();
  const ingest = new FactsIngestService({
    store,
    validator,
    deviceLocks,
    logger: createScopedLogger("FactsIngest")
  });
  const topology = new TopologyService({
    store,
    validator,
    deviceLocks,
    logger: createScopedLogger("Topology")
  });

  const deps: ApiDependencies = { store, ingest, validator, topology };
  const dispatch = createApiHandler(createRoutes(deps), createScopedLogger("API"));
  const server = createHttpServer({
    dispatch,
    corsOrigins: settings.corsOrigins,
    logger: createScopedLogger("HTTP")
  });

  return { ...deps, dispatch, server };
}

export { closeServer, listen } from "./httpServer";
export { API_PREFIX } from "./routes";
