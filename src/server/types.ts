/**
 * Transport-level types shared by the router and the HTTP server
 */

import type { FactsIngestService, LinkValidationService, TopologyService } from "../services";
import type { TopologyStore } from "../shared/io/TopologyStore";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE" | "OPTIONS";

/** A decoded request, independent of the socket it arrived on. */
export interface ApiRequest {
  method: string;
  path: string;
  body?: unknown;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  details?: string[];
}

export interface ApiReply {
  status: number;
  body: ApiResponse;
}

/** Everything the route handlers call into. */
export interface ApiDependencies {
  store: TopologyStore;
  ingest: FactsIngestService;
  validator: LinkValidationService;
  topology: TopologyService;
}

export type RouteParams = Record<string, string>;

export type RouteHandler = (params: RouteParams, body: unknown) => Promise<ApiReply>;

export interface Route {
  method: HttpMethod;
  /** Path template, e.g. "/api/v1/devices/:deviceId" */
  path: string;
  handler: RouteHandler;
}
