import type http from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Place } from "../../core/types.js";
import { createLogger } from "../../logger.js";
import { createInMemoryDirectory, type Directory } from "../directory.js";
import { startServer } from "../server.js";

const places: Place[] = [
  { name: "London", region: "ON", country: "Canada", latitude: 42.98339, longitude: -81.23304, population: 346765 },
  { name: "London", region: "OH", country: "USA", latitude: 39.88645, longitude: -83.44825, population: 9904 },
  { name: "Londontowne", region: "MD", country: "USA", latitude: 38.93345, longitude: -76.54941, population: 7200 },
];

describe("http server", () => {
  let server: http.Server;
  let base: string;
  let directory: Directory;

  beforeEach(async () => {
    directory = createInMemoryDirectory(places);
    const started = await startServer({
      port: 0,
      host: "127.0.0.1",
      directory,
      logger: createLogger({ level: "silent", env: "test" }),
    });
    server = started.server;
    base = `http://127.0.0.1:${started.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it("serves popularity-ranked suggestions", async () => {
    const res = await fetch(`${base}/suggestions?q=Londo`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(await res.json()).toEqual({
      suggestions: [
        { name: "London, ON, Canada", latitude: "42.98339", longitude: "-81.23304", score: 0.9 },
        { name: "London, OH, USA", latitude: "39.88645", longitude: "-83.44825", score: 0.3 },
        { name: "Londontowne, MD, USA", latitude: "38.93345", longitude: "-76.54941", score: 0.3 },
      ],
    });
  });

  it("ranks by distance when both coordinates are given", async () => {
    const res = await fetch(`${base}/suggestions?q=London&latitude=42.98339&longitude=-81.23304`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      suggestions: [
        { name: "London, ON, Canada", score: 1 },
        { name: "London, OH, USA", score: 0.5 },
        { name: "Londontowne, MD, USA", score: 0.3 },
      ],
    });
  });

  it("falls back to popularity when only one coordinate is given", async () => {
    const res = await fetch(`${base}/suggestions?q=London&latitude=42.98339`);
    expect(await res.json()).toMatchObject({ suggestions: [{ score: 0.9 }, { score: 0.3 }, { score: 0.3 }] });
  });

  it("applies a limit", async () => {
    const res = await fetch(`${base}/suggestions?q=Londo&limit=2`);
    expect(await res.json()).toMatchObject({
      suggestions: [{ name: "London, ON, Canada" }, { name: "London, OH, USA" }],
    });
  });

  it("returns an empty list when nothing matches", async () => {
    const res = await fetch(`${base}/suggestions?q=Xyz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ suggestions: [] });
  });

  it("rejects a missing query with a problem document", async () => {
    const res = await fetch(`${base}/suggestions`);
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await res.json()).toMatchObject({
      status: 400,
      code: "INVALID_ARGUMENT",
      errors: [{ path: "q", message: "is required" }],
    });
  });

  it("rejects non-numeric coordinates and bad limits", async () => {
    const res = await fetch(`${base}/suggestions?q=a&latitude=north&longitude=1&limit=0`);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: [{ path: "latitude" }, { path: "limit" }] });
  });

  it("rejects out-of-range coordinates as unprocessable", async () => {
    const res = await fetch(`${base}/suggestions?q=London&latitude=91&longitude=0`);
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ code: "UNPROCESSABLE_ENTITY" });
  });

  it("adds places and reports per-item failures", async () => {
    const res = await fetch(`${base}/places`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        places: [
          { name: "Paris", region: "ON", country: "Canada", latitude: 43.2, longitude: -80.38333, population: 11177 },
          places[0],
          { name: "Nowhere", region: "XX", country: "YY", latitude: 0, longitude: 0, population: 0 },
        ],
      }),
    });
    expect(res.status).toBe(207);
    expect(await res.json()).toEqual({
      added: 1,
      duplicates: 1,
      failed: 1,
      failures: [{ index: 2, errors: [{ path: "$.places[2].population", message: "must be a positive number" }] }],
    });
    expect(directory.size).toBe(4);

    const found = await fetch(`${base}/suggestions?q=par`);
    expect(await found.json()).toEqual({
      suggestions: [{ name: "Paris, ON, Canada", latitude: "43.2", longitude: "-80.38333", score: 1 }],
    });
  });

  it("removes places", async () => {
    const res = await fetch(`${base}/places`, {
      method: "DELETE",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ places: [places[1]] }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ removed: 1, missing: 0, failed: 0, failures: [] });
    expect(directory.size).toBe(2);
  });

  it("requires a JSON body for place changes", async () => {
    const wrongType = await fetch(`${base}/places`, { method: "POST", headers: { "content-type": "text/plain" }, body: "x" });
    expect(wrongType.status).toBe(415);

    const badJson = await fetch(`${base}/places`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    expect(badJson.status).toBe(400);

    const empty = await fetch(`${base}/places`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ places: [] }),
    });
    expect(empty.status).toBe(400);
  });

  it("reports health with the place count", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", service: "place-suggest", places: 3 });
  });

  it("answers unknown routes and methods with problems", async () => {
    expect((await fetch(`${base}/nope`)).status).toBe(404);
    expect((await fetch(`${base}/suggestions?q=a`, { method: "POST" })).status).toBe(405);
  });
});
