import http from "node:http";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import type { Coordinates, Place } from "../core/types.js";
import { isCoreError } from "../core/errors.js";
import { isValidCoordinates } from "../core/geo.js";
import { logger as rootLogger, SERVICE } from "../logger.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asPlace, isRecord, parseIntParam, parseNumberParam, pushErr } from "./validation.js";
import { createInMemoryDirectory, type Directory } from "./directory.js";

const VERSION = "0.1.0";

const MAX_BATCH = 1000;
const MAX_LIMIT = 1000;
const MAX_QUERY_LENGTH = 256;

export interface ServerOptions {
  port?: number;
  host?: string;
  directory?: Directory;
  logger?: Logger;
}

type ItemFailure = { index: number; errors: FieldError[] };

class BadJsonError extends Error {}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const directory = opts.directory ?? createInMemoryDirectory();
  const log = opts.logger ?? rootLogger;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const reqLog = log.child({ requestId, method: req.method, path: url.pathname });
    res.setHeader("x-request-id", requestId);

    const fail = (status: number, body: Problem): void => {
      reqLog.debug({ status, code: body.code }, "request rejected");
      sendProblem(res, status, body);
    };

    try {
      if (url.pathname === "/health") {
        if (req.method !== "GET") {
          return fail(405, problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: "use GET", instance: url.pathname, requestId }));
        }
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          places: directory.size,
        });
      }

      if (url.pathname === "/suggestions") {
        if (req.method !== "GET") {
          return fail(405, problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: "use GET", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const q = url.searchParams.get("q");
        if (q === null) pushErr(errors, "q", "is required");
        if (q !== null && q.length > MAX_QUERY_LENGTH) pushErr(errors, "q", "too long");

        const latRaw = url.searchParams.get("latitude");
        const lonRaw = url.searchParams.get("longitude");
        const latitude = latRaw === null ? undefined : parseNumberParam(latRaw);
        const longitude = lonRaw === null ? undefined : parseNumberParam(lonRaw);
        if (latRaw !== null && latitude === undefined) pushErr(errors, "latitude", "must be a number");
        if (lonRaw !== null && longitude === undefined) pushErr(errors, "longitude", "must be a number");

        const limitRaw = url.searchParams.get("limit");
        const limit = limitRaw === null ? undefined : parseIntParam(limitRaw);
        if (limitRaw !== null && (limit === undefined || limit < 1 || limit > MAX_LIMIT)) {
          pushErr(errors, "limit", `must be an integer between 1 and ${MAX_LIMIT}`);
        }

        if (errors.length || q === null) {
          return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        // a lone coordinate is ignored: ranking falls back to popularity
        let origin: Coordinates | undefined;
        if (latitude !== undefined && longitude !== undefined) {
          origin = { latitude, longitude };
          if (!isValidCoordinates(origin)) {
            return fail(422, problem({
              status: 422,
              code: "UNPROCESSABLE_ENTITY",
              detail: "latitude must be within ±90 and longitude within ±180",
              instance: url.pathname,
              requestId,
            }));
          }
        }

        const started = Date.now();
        const body = directory.suggest({ q, origin, limit });
        reqLog.debug({ q, ranked: body.suggestions.length, tookMs: Date.now() - started }, "suggestions served");
        return sendJson(res, 200, body);
      }

      if (url.pathname === "/places") {
        if (req.method !== "POST" && req.method !== "DELETE") {
          return fail(405, problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: "use POST or DELETE", instance: url.pathname, requestId }));
        }
        if (!isJson(req)) {
          return fail(415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const body = await readJson(req);
        if (!isRecord(body)) {
          return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const placesVal = body.places;
        if (!Array.isArray(placesVal)) pushErr(errors, "$.places", "must be an array");
        const items: unknown[] = Array.isArray(placesVal) ? placesVal : [];
        if (Array.isArray(placesVal) && items.length < 1) pushErr(errors, "$.places", "must contain at least 1 item");
        if (items.length > MAX_BATCH) pushErr(errors, "$.places", `must contain at most ${MAX_BATCH} items`);

        if (errors.length) {
          return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const accepted: Place[] = [];
        const failures: ItemFailure[] = [];
        items.forEach((item, index) => {
          const itemErrors: FieldError[] = [];
          const place = asPlace(item, `$.places[${index}]`, itemErrors);
          if (place) accepted.push(place);
          else failures.push({ index, errors: itemErrors });
        });

        let changed = 0;
        for (const place of accepted) {
          if (req.method === "POST" ? directory.add(place) : directory.remove(place)) changed++;
        }

        const status = failures.length > 0 ? 207 : 200;
        const unchanged = accepted.length - changed;
        reqLog.info({ changed, unchanged, failed: failures.length }, req.method === "POST" ? "places added" : "places removed");

        return sendJson(
          res,
          status,
          req.method === "POST"
            ? { added: changed, duplicates: unchanged, failed: failures.length, failures }
            : { removed: changed, missing: unchanged, failed: failures.length, failures },
        );
      }

      return fail(404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof BadJsonError) {
        return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance: url.pathname, requestId }));
      }
      if (isCoreError(e)) {
        reqLog.warn({ err: e, code: e.code }, "core rejected input");
        return fail(422, problem({ status: 422, code: "UNPROCESSABLE_ENTITY", detail: e.message, instance: url.pathname, requestId }));
      }
      reqLog.error({ err: e }, "unhandled error");
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    if (opts.host) server.listen(port, opts.host, () => resolve());
    else server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return ct.split(";")[0].trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadJsonError("invalid json");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
