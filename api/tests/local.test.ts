import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import type { Config } from "../src/config";
import { createApp } from "../src/local";
import { REFERENCE_DATE } from "./helpers";

const config: Config = { port: 0, bodyLimit: "1mb", maxCount: 5, defaultBundleSize: 10 };

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  server = await new Promise<Server>((resolve) => {
    const s = createApp(config).listen(0, "127.0.0.1", () => resolve(s));
  });
  const address: string | AddressInfo | null = server.address();
  if (!address || typeof address === "string") throw new Error("server has no TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

function postGenerate(body: string) {
  return fetch(`${baseUrl}/api/generate`, { method: "POST", headers: { "content-type": "application/json" }, body });
}

describe("local API", () => {
  it("answers the health check", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("lists the bundled personas", async () => {
    const res = await fetch(`${baseUrl}/api/personas`);
    expect(await res.json()).toEqual({ personas: ["diabetic-adult", "family-caregiver", "pediatric-asthma"] });
  });

  it("generates bundles for a persona", async () => {
    const res = await postGenerate(JSON.stringify({ persona: "family-caregiver", seed: 1, referenceDate: REFERENCE_DATE }));
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^application\/json/);
    expect(await res.json()).toMatchObject({ seed: 1, patients: 1, resources: 6, bundles: [{ resourceType: "Bundle" }] });
  });

  it("rejects a body naming both a profile and a persona", async () => {
    const res = await postGenerate(JSON.stringify({ persona: "family-caregiver", profile: {} }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request: exactly one of profile or persona is required", kind: "request" });
  });

  it("rejects a count above the configured limit", async () => {
    const res = await postGenerate(JSON.stringify({ profile: {}, count: 6 }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "count 6 exceeds the limit of 5", kind: "request" });
  });

  it("reports a broken profile as unprocessable", async () => {
    const res = await postGenerate(JSON.stringify({ profile: { mode: "weird" } }));
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ kind: "configuration", details: { path: "mode" } });
  });

  it("answers malformed JSON with a JSON 400", async () => {
    const res = await postGenerate("{ not json");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "request body is not valid JSON", kind: "request" });
  });
});
