/**
 * HTTP front end: decodes requests, applies CORS, hands them to the API
 * dispatcher and writes JSON replies.
 */

import * as http from "http";

import { RequestValidationError, errorMessage } from "../shared/errors";
import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";

import type { ApiReply, ApiRequest } from "./types";

/** Upper bound for request bodies; configuration dumps stay well below it. */
export const MAX_BODY_BYTES = 5 * 1024 * 1024;

export interface HttpServerOptions {
  dispatch: (request: ApiRequest) => Promise<ApiReply>;
  corsOrigins: string[];
  logger?: IOLogger;
}

/**
 * Read and decode a JSON request body. An empty body decodes to undefined.
 */
export async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new RequestValidationError(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString("utf8");
  if (text.trim().length === 0) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new RequestValidationError("Request body is not valid JSON", [errorMessage(err)]);
  }
}

function corsHeaders(origin: string | undefined, allowed: string[]): Record<string, string> {
  if (!origin || !allowed.includes(origin)) return {};
  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Methods": "GET, POST, PATCH, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
    Vary: "Origin"
  };
}

function sendJson(res: http.ServerResponse, reply: ApiReply, headers: Record<string, string>): void {
  const payload = JSON.stringify(reply.body);
  res.writeHead(reply.status, {
    ...headers,
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload)
  });
  res.end(payload);
}

export function createHttpServer(options: HttpServerOptions): http.Server {
  const logger = options.logger ?? noopLogger;

  return http.createServer((req, res) => {
    const method = (req.method ?? "GET").toUpperCase();
    const url = new URL(req.url ?? "/", "http://localhost");
    const headers = corsHeaders(req.headers.origin, options.corsOrigins);

    if (method === "OPTIONS") {
      res.writeHead(204, headers);
      res.end();
      return;
    }

    const handle = async (): Promise<void> => {
      let reply: ApiReply;
      try {
        const body = method === "GET" || method === "DELETE" ? undefined : await readJsonBody(req);
        reply = await options.dispatch({ method, path: url.pathname, body });
      } catch (err) {
        const status = err instanceof RequestValidationError ? 400 : 500;
        reply = { status, body: { success: false, error: errorMessage(err) } };
      }
      logger.debug(`${method} ${url.pathname} -> ${reply.status}`);
      sendJson(res, reply, headers);
    };

    handle().catch((err: unknown) => {
      logger.error(`Failed to answer ${method} ${url.pathname}: ${errorMessage(err)}`);
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });
}

/**
 * Start listening; resolves with the bound server.
 */
export async function listen(server: http.Server, port: number, host: string): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}

export async function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
