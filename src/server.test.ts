import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket, { type RawData } from "ws";
import {
  createAppServer,
  type AppServer,
  parseCalibration,
  parseClientMessage,
  parseObservations,
  parseStiffnessOptions,
} from "./server.js";
import { SessionManager } from "./session-manager.js";
import { loadConfig } from "./config.js";
import { MalformedInputError } from "./errors.js";
import { Site, SessionState, type ServerMessage } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: ServerMessage[] = [];
  private waiters: Array<(msg: ServerMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: RawData) => {
      const msg: ServerMessage = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(msg);
      } else {
        this.messageQueue.push(msg);
      }
    });
  }

  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const waiterFn = (msg: ServerMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

function getPort(server: AppServer): number {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return addr.port;
}

/** Three frames with distal at the origin and proximal 50 px away. */
const THREE_FRAMES = {
  distal: [
    { x: 0, y: 0 },
    { x: 0, y: 0 },
    { x: 0, y: 0 },
  ],
  proximal: [
    { x: 30, y: 40 },
    { x: 30, y: 40 },
    { x: 30, y: 40 },
  ],
};

// ─── HTTP API ───────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer;
  let baseUrl: string;
  let clients: TestClient[];

  beforeEach(async () => {
    const logger = createSilentLogger();
    const sessionManager = new SessionManager({ settings: loadConfig({}), logger });
    server = createAppServer({ logger, sessionManager });
    await server.listen(TEST_PORT);
    baseUrl = `http://127.0.0.1:${getPort(server)}`;
    clients = [];
  });

  afterEach(async () => {
    for (const c of clients) c.close();
    await server.close();
  });

  function request(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function loadedSession(): Promise<string> {
    const { id } = server.sessionManager.createSession();
    const res = await request("POST", `/api/sessions/${id}/observations`, THREE_FRAMES);
    expect(res.status).toBe(200);
    return id;
  }

  async function createClient(): Promise<TestClient> {
    const client = new TestClient(`ws://127.0.0.1:${getPort(server)}`);
    clients.push(client);
    await client.waitForOpen();
    return client;
  }

  describe("HTTP endpoints", () => {
    it("responds to /health", async () => {
      const response = await fetch(`${baseUrl}/health`);
      expect(response.ok).toBe(true);
      expect(await response.json()).toEqual({ status: "ok" });
    });

    it("creates a session", async () => {
      const res = await request("POST", "/api/sessions");

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        sessionId: expect.any(String),
        summary: expect.objectContaining({ state: SessionState.IDLE, frameCount: 0 }),
      });
    });

    it("returns 404 for an unknown session", async () => {
      const res = await request("GET", "/api/sessions/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: "SESSION_NOT_FOUND", message: "Session not found: nope", retryable: false },
      });
    });

    it("reports trajectories as not ready before a load", async () => {
      const { id } = server.sessionManager.createSession();
      const res = await request("GET", `/api/sessions/${id}/trajectories`);

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: {
          code: "DATA_NOT_READY",
          message: "No trajectories have been loaded for this session yet",
          retryable: true,
        },
      });
    });

    it("loads observations, numbering frames by position", async () => {
      const { id } = server.sessionManager.createSession();
      const res = await request("POST", `/api/sessions/${id}/observations`, THREE_FRAMES);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(expect.objectContaining({ frameCount: 3 }));

      const trajectories = await request("GET", `/api/sessions/${id}/trajectories`);
      expect(await trajectories.json()).toEqual({
        distal: {
          site: "distal",
          points: [0, 1, 2].map((frameIndex) => ({ frameIndex, x: 0, y: 0 })),
        },
        proximal: {
          site: "proximal",
          points: [0, 1, 2].map((frameIndex) => ({ frameIndex, x: 30, y: 40 })),
        },
      });
    });

    it("rejects a malformed observation body with 400", async () => {
      const { id } = server.sessionManager.createSession();
      const res = await request("POST", `/api/sessions/${id}/observations`, { distal: "x", proximal: [] });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "MALFORMED_INPUT", message: "distal must be an array", retryable: false },
      });
    });

    it("rejects a body that is not JSON with 400", async () => {
      const { id } = server.sessionManager.createSession();
      const res = await fetch(`${baseUrl}/api/sessions/${id}/observations`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: expect.objectContaining({ code: "MALFORMED_INPUT" }) });
    });

    it("acknowledges corrections and resets them only with confirmation", async () => {
      const id = await loadedSession();

      const put = await request("PUT", `/api/sessions/${id}/corrections`, {
        corrections: [{ frameIndex: 1, site: Site.PROXIMAL, x: 33, y: 44 }],
      });
      expect(await put.json()).toEqual({ acknowledged: true, correctionCount: 1 });

      const unconfirmed = await request("DELETE", `/api/sessions/${id}/corrections`);
      expect(unconfirmed.status).toBe(400);
      expect(server.sessionManager.summary(id).correctionCount).toBe(1);

      const confirmed = await request("DELETE", `/api/sessions/${id}/corrections?confirm=true`);
      expect(await confirmed.json()).toEqual({ reset: true, cleared: 1 });
    });

    it("rejects a correction for an unknown site", async () => {
      const id = await loadedSession();
      const res = await request("PUT", `/api/sessions/${id}/corrections`, {
        corrections: [{ frameIndex: 1, site: "knee", x: 1, y: 1 }],
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "MALFORMED_INPUT",
          message: "corrections[0].site must be one of distal, proximal",
          retryable: false,
        },
      });
    });

    it("calibrates against the reference frame", async () => {
      const id = await loadedSession();
      const res = await request("POST", `/api/sessions/${id}/calibration`, { referenceFrame: 0, factorPxPerMm: 10 });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toEqual(
        expect.objectContaining({
          controlPoints: [
            { x: 0, y: 0 },
            { x: 30, y: 40 },
          ],
          conversionFactorPxPerMm: 10,
          referenceFrame: 0,
        }),
      );
      expect(server.sessionManager.summary(id).calibration?.baselineLengthMm).toBeCloseTo(5, 9);
    });

    it("returns 422 for a zero conversion factor", async () => {
      const id = await loadedSession();
      const res = await request("POST", `/api/sessions/${id}/calibration`, { referenceFrame: 0, factorPxPerMm: 0 });

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ error: expect.objectContaining({ code: "INVALID_CALIBRATION" }) });
    });

    it("accepts the force ramp as CSV or as samples", async () => {
      const { id } = server.sessionManager.createSession();

      const csv = await request("POST", `/api/sessions/${id}/force`, { csv: "frame,torque\n0,0\n1,0.4\n" });
      expect(await csv.json()).toEqual({ samples: 2 });

      const samples = await request("POST", `/api/sessions/${id}/force`, {
        samples: [{ frameIndex: 0, torqueNm: 1 }],
      });
      expect(await samples.json()).toEqual({ samples: 1 });
    });

    it("returns 409 when stiffness is requested before calibration", async () => {
      const id = await loadedSession();
      await request("POST", `/api/sessions/${id}/force`, { samples: [{ frameIndex: 0, torqueNm: 1 }] });

      const res = await request("POST", `/api/sessions/${id}/stiffness`, {});

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: {
          code: "MISSING_BASELINE",
          message: "Baseline length has not been calibrated for this session.",
          retryable: false,
        },
      });
    });

    it("deletes a session", async () => {
      const id = await loadedSession();

      const res = await request("DELETE", `/api/sessions/${id}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ deleted: true });

      const after = await request("GET", `/api/sessions/${id}`);
      expect(after.status).toBe(404);
      expect((await request("DELETE", `/api/sessions/${id}`)).status).toBe(404);
    });

    it("saves nothing when no persistence is configured", async () => {
      const id = await loadedSession();
      const res = await request("POST", `/api/sessions/${id}/save`);
      expect(await res.json()).toEqual({ paths: [] });
    });
  });

  // ─── WebSocket Events ─────────────────────────────────────────────────────

  describe("WebSocket events", () => {
    it("confirms a subscription with the session summary", async () => {
      const { id } = server.sessionManager.createSession();
      const client = await createClient();

      client.sendJson({ type: "subscribe", sessionId: id });

      expect(await client.nextMessage()).toEqual({
        type: "subscribed",
        sessionId: id,
        summary: server.sessionManager.summary(id),
      });
    });

    it("forwards the subscribed session's events", async () => {
      const id = await loadedSession();
      const other = await loadedSession();
      const client = await createClient();
      client.sendJson({ type: "subscribe", sessionId: id });
      await client.nextMessage();

      await request("PUT", `/api/sessions/${other}/corrections`, {
        corrections: [{ frameIndex: 0, site: Site.DISTAL, x: 1, y: 1 }],
      });
      await request("PUT", `/api/sessions/${id}/corrections`, {
        corrections: [{ frameIndex: 0, site: Site.DISTAL, x: 1, y: 1 }],
      });

      expect(await client.nextMessage()).toEqual({ type: "corrections_updated", sessionId: id, correctionCount: 1 });
    });

    it("tells subscribers when their session is deleted", async () => {
      const id = await loadedSession();
      const client = await createClient();
      client.sendJson({ type: "subscribe", sessionId: id });
      await client.nextMessage();

      await request("DELETE", `/api/sessions/${id}`);

      expect(await client.nextMessage()).toEqual({ type: "session_deleted", sessionId: id });
    });

    it("stops forwarding after unsubscribe", async () => {
      const id = await loadedSession();
      const client = await createClient();
      client.sendJson({ type: "subscribe", sessionId: id });
      await client.nextMessage();

      client.sendJson({ type: "unsubscribe", sessionId: id });
      expect(await client.nextMessage()).toEqual({ type: "unsubscribed", sessionId: id });

      await request("PUT", `/api/sessions/${id}/corrections`, {
        corrections: [{ frameIndex: 0, site: Site.DISTAL, x: 1, y: 1 }],
      });
      await expect(client.nextMessage(200)).rejects.toThrow("nextMessage timed out after 200ms");
    });

    it("answers an unknown session with a protocol error", async () => {
      const client = await createClient();
      client.sendJson({ type: "subscribe", sessionId: "nope" });

      expect(await client.nextMessage()).toEqual({ type: "protocol_error", message: "Session not found: nope" });
    });

    it("answers text that is not JSON with a protocol error", async () => {
      const client = await createClient();
      client.ws.send("hello");

      expect(await client.nextMessage()).toEqual({ type: "protocol_error", message: "Message is not valid JSON" });
    });

    it("rejects binary frames", async () => {
      const client = await createClient();
      client.ws.send(Buffer.from([1, 2, 3]));

      expect(await client.nextMessage()).toEqual({
        type: "protocol_error",
        message: "Binary frames are not supported",
      });
    });
  });
});

// ─── Request Parsers ──────────────────────────────────────────────────────────

describe("parseObservations", () => {
  it("keeps explicit frame indices", () => {
    const parsed = parseObservations({
      distal: [{ frameIndex: 4, x: 1, y: 2 }],
      proximal: [{ x: 3, y: 4 }],
    });
    expect(parsed).toEqual({
      distal: [{ frameIndex: 4, x: 1, y: 2 }],
      proximal: [{ frameIndex: 0, x: 3, y: 4 }],
    });
  });

  it("rejects a non-numeric coordinate", () => {
    expect(() => parseObservations({ distal: [{ x: "1", y: 2 }], proximal: [] })).toThrow(
      "distal[0].x must be a finite number",
    );
  });
});

describe("parseCalibration", () => {
  it("drops unplaced extra points", () => {
    expect(
      parseCalibration({ referenceFrame: 2, factorPxPerMm: 4, extraPoints: [null, { x: 1, y: 1 }, null] }),
    ).toEqual({ referenceFrame: 2, factorPxPerMm: 4, extraPoints: [{ x: 1, y: 1 }] });
  });

  it("leaves the factor range to the calibration check", () => {
    expect(parseCalibration({ referenceFrame: 0, factorPxPerMm: -1 }).factorPxPerMm).toBe(-1);
  });

  it("requires a numeric factor", () => {
    expect(() => parseCalibration({ referenceFrame: 0, factorPxPerMm: "10" })).toThrow(MalformedInputError);
  });
});

describe("parseStiffnessOptions", () => {
  it("treats a missing or empty body as no overrides", () => {
    expect(parseStiffnessOptions(undefined)).toEqual({});
    expect(parseStiffnessOptions({})).toEqual({});
  });

  it("reads every override", () => {
    expect(
      parseStiffnessOptions({ tendonMomentArmM: 0.05, lowerLegMomentArmM: 0.3, applyLeverRatio: true, regressionRange: "tf80" }),
    ).toEqual({ tendonMomentArmM: 0.05, lowerLegMomentArmM: 0.3, applyLeverRatio: true, regressionRange: "tf80" });
  });

  it("rejects an unknown regression range", () => {
    expect(() => parseStiffnessOptions({ regressionRange: "tf50" })).toThrow('regressionRange must be "full" or "tf80"');
  });
});

describe("parseClientMessage", () => {
  it("parses a subscribe message", () => {
    expect(parseClientMessage('{"type":"subscribe","sessionId":"abc"}')).toEqual({ type: "subscribe", sessionId: "abc" });
  });

  it("rejects an unknown message type", () => {
    expect(() => parseClientMessage('{"type":"start","sessionId":"abc"}')).toThrow(MalformedInputError);
  });
});
