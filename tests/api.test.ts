// ============================================
// API Tests — Express app end-to-end
// ============================================
// Starts the app on an ephemeral loopback port inside the test process.
// The model provider is an in-process fake.

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "http";
import { createApp, type AppDeps } from "../src/app.js";
import { BriefGenerator } from "../src/brief/generate.js";
import { SlidingWindowRateLimiter } from "../src/rateLimit/slidingWindow.js";
import { makeFakeClient, SAMPLE_BRIEF } from "./helpers.js";

const MAX_REQUESTS = 3;

const VALID_BODY = {
  brand_name: "Acme",
  platform: "Instagram",
  goal: "Awareness",
  tone: "Friendly",
};

let server: Server | undefined;
let baseUrl = "";

async function startApp(deps: AppDeps): Promise<void> {
  const started = await new Promise<Server>((resolve) => {
    const s = createApp(deps).listen(0, "127.0.0.1", () => resolve(s));
  });
  server = started;

  const address = started.address();
  if (!address || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
}

async function stopApp(): Promise<void> {
  const running = server;
  if (!running) return;
  server = undefined;

  running.closeAllConnections();
  await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
}

function postBrief(body: unknown, options: { ip?: string; raw?: string } = {}) {
  return fetch(`${baseUrl}/api/generate-brief/`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "X-Forwarded-For": options.ip ?? "203.0.113.10",
    },
    body: options.raw ?? JSON.stringify(body),
  });
}

function makeDeps(overrides: Partial<AppDeps> = {}) {
  const fake = makeFakeClient();
  const deps: AppDeps = {
    generator: new BriefGenerator({ client: fake.client, model: "gpt-4o-mini" }),
    limiter: new SlidingWindowRateLimiter({ maxRequests: MAX_REQUESTS, windowMs: 60_000 }),
    profanityTerms: [],
    ...overrides,
  };
  return { deps, create: fake.create };
}

afterEach(async () => {
  await stopApp();
});

// ============================================
// POST /api/generate-brief/
// ============================================

describe("POST /api/generate-brief/", () => {
  let create: ReturnType<typeof makeFakeClient>["create"];

  beforeEach(async () => {
    const setup = makeDeps();
    create = setup.create;
    await startApp(setup.deps);
  });

  it("returns a brief with telemetry and remaining quota", async () => {
    const res = await postBrief(VALID_BODY);
    const data = await res.json();

    expect(res.status).toBe(200);
    expect(data.brief).toBe(SAMPLE_BRIEF.brief);
    expect(data.angles).toHaveLength(3);
    expect(data.criteria).toHaveLength(3);
    expect(data.telemetry.tokens_total).toBe(data.telemetry.tokens_prompt + data.telemetry.tokens_completion);
    expect(data.telemetry.latency_ms).toBeGreaterThanOrEqual(0);
    expect(data.telemetry.estimated_cost_usd).toBe(0.00012);
    expect(data.rate_limit).toEqual({ remaining: MAX_REQUESTS - 1 });
  });

  it("sets request id and rate-limit headers", async () => {
    const res = await postBrief(VALID_BODY);

    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f]{8}$/);
    expect(res.headers.get("x-ratelimit-limit")).toBe(String(MAX_REQUESTS));
    expect(res.headers.get("x-ratelimit-remaining")).toBe(String(MAX_REQUESTS - 1));
  });

  it("echoes a caller-supplied request id", async () => {
    const res = await fetch(`${baseUrl}/api/generate-brief`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "X-Request-Id": "trace-42" },
      body: JSON.stringify(VALID_BODY),
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toBe("trace-42");
  });

  it("denies the request after max_requests with 429 and remaining 0", async () => {
    const statuses: number[] = [];
    let last: Response | undefined;

    for (let i = 0; i < MAX_REQUESTS + 1; i++) {
      last = await postBrief(VALID_BODY);
      statuses.push(last.status);
    }

    expect(statuses).toEqual([200, 200, 200, 429]);
    expect(await last?.json()).toEqual({
      error: "Rate limit exceeded. Please try again later.",
      remaining: 0,
    });
    expect(last?.headers.get("retry-after")).toBe("60");
    expect(create).toHaveBeenCalledTimes(MAX_REQUESTS);
  });

  it("keys the limit on the first forwarded-for entry", async () => {
    await postBrief(VALID_BODY, { ip: "198.51.100.7, 10.0.0.1" });
    await postBrief(VALID_BODY, { ip: "198.51.100.7" });
    await postBrief(VALID_BODY, { ip: "198.51.100.7, 10.0.0.2" });

    const blocked = await postBrief(VALID_BODY, { ip: "198.51.100.7" });
    const other = await postBrief(VALID_BODY, { ip: "198.51.100.8" });

    expect(blocked.status).toBe(429);
    expect(other.status).toBe(200);
  });

  it("falls back to the socket address when the first forwarded-for entry is empty", async () => {
    const statuses: number[] = [];
    for (const ip of [", 198.51.100.9", ", 198.51.100.10", " , 198.51.100.11"]) {
      statuses.push((await postBrief(VALID_BODY, { ip })).status);
    }

    const direct = await fetch(`${baseUrl}/api/generate-brief/`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(VALID_BODY),
    });

    expect(statuses).toEqual([200, 200, 200]);
    expect(direct.status).toBe(429);
  });

  it("counts requests with bad bodies against the limit", async () => {
    for (let i = 0; i < MAX_REQUESTS; i++) {
      const res = await postBrief(undefined, { raw: "{not json" });
      expect(res.status).toBe(400);
    }

    const res = await postBrief(VALID_BODY);
    expect(res.status).toBe(429);
  });

  it("rejects a disallowed platform and names the allowed set", async () => {
    const res = await postBrief({ ...VALID_BODY, platform: "Snapchat" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Platform must be one of: Instagram, TikTok, UGC" });
    expect(create).not.toHaveBeenCalled();
  });

  it("rejects malformed JSON", async () => {
    const res = await postBrief(undefined, { raw: "{not json" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON in request body" });
  });

  it("rejects an empty body as invalid JSON", async () => {
    const res = await postBrief(undefined, { raw: "" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON in request body" });
    expect(create).not.toHaveBeenCalled();
  });

  it("rejects a whitespace-only body as invalid JSON", async () => {
    const res = await postBrief(undefined, { raw: "  \n" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON in request body" });
  });

  it("treats missing fields as empty", async () => {
    const res = await postBrief({ platform: "Instagram" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Brand name is required" });
  });

  it("trims fields before validating", async () => {
    const res = await postBrief({ ...VALID_BODY, brand_name: "  Acme  ", platform: " TikTok " });

    expect(res.status).toBe(200);
    const userPrompt = create.mock.calls[0]?.[0].messages[1].content;
    expect(userPrompt).toContain("Generate a campaign brief for Acme.");
    expect(userPrompt).toContain("Platform: TikTok");
  });

  it("rejects non-string fields", async () => {
    const res = await postBrief({ ...VALID_BODY, tone: 3 });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "tone must be a string" });
  });

  it("rejects a JSON array body", async () => {
    const res = await postBrief([VALID_BODY]);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be a JSON object" });
  });

  it("rejects oversized bodies with 413", async () => {
    const res = await postBrief({ ...VALID_BODY, padding: "x".repeat(200 * 1024) });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: "Request body too large" });
  });

  it("answers other methods with 405", async () => {
    const res = await fetch(`${baseUrl}/api/generate-brief/`);

    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("POST");
    expect(await res.json()).toEqual({ error: "Method not allowed" });
  });
});

// ============================================
// Provider failures
// ============================================

describe("POST /api/generate-brief/ provider failures", () => {
  it("maps a wrong-shaped reply to 502", async () => {
    const fake = makeFakeClient(JSON.stringify({ ...SAMPLE_BRIEF, angles: ["one", "two"] }));
    const { deps } = makeDeps({
      generator: new BriefGenerator({ client: fake.client, model: "gpt-4o-mini" }),
    });
    await startApp(deps);

    const res = await postBrief(VALID_BODY);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "Invalid provider response: Angles must be an array of exactly 3 items (got 2)",
    });
  });

  it("maps an unreachable provider to 500", async () => {
    const fake = makeFakeClient();
    fake.create.mockRejectedValue(new Error("socket hang up"));
    const { deps } = makeDeps({
      generator: new BriefGenerator({ client: fake.client, model: "gpt-4o-mini" }),
    });
    await startApp(deps);

    const res = await postBrief(VALID_BODY);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Service error: socket hang up" });
  });

  it("maps any other failure to 500", async () => {
    const { deps } = makeDeps({
      generator: { generate: vi.fn().mockRejectedValue(new Error("boom")) },
    });
    await startApp(deps);

    const res = await postBrief(VALID_BODY);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Unexpected error: boom" });
  });
});

// ============================================
// Other routes
// ============================================

describe("other routes", () => {
  beforeEach(async () => {
    await startApp(makeDeps().deps);
  });

  it("GET /healthz reports ok", async () => {
    const res = await fetch(`${baseUrl}/healthz`);
    const data = await res.json();

    expect(res.status).toBe(200);
    expect(data.status).toBe("ok");
  });

  it("GET / serves the landing page", async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
    expect(await res.text()).toContain("<h1>Campaign Brief Generator</h1>");
  });
});
