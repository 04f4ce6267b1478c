// Tendon Stiffness Analyzer - HTTP API and WebSocket event channel
//
// Request/response operations go over Express routes under /api/sessions.
// Clients that want progress updates open a WebSocket, subscribe to a session
// id, and receive that session's events as JSON text frames.

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { isAnalysisError, MalformedInputError, toErrorPayload } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { SessionManager, type CalibrationRequest } from "./session-manager.js";
import { Site, SITES } from "./types.js";
import type {
  ClientMessage,
  Correction,
  ForceSample,
  Observation,
  Point,
  ServerMessage,
  SessionEvent,
  SiteRecord,
  StiffnessOptions,
} from "./types.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
  /** Upper bound on JSON request bodies; observation uploads can be large. */
  bodyLimit?: string;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const {
    logger = createConsoleLogger("Server"),
    sessionManager = new SessionManager({ logger }),
    bodyLimit = "20mb",
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: bodyLimit }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/sessions", createSessionRouter(sessionManager));
  app.use(errorHandler(logger));

  const wss = new WebSocketServer({ server: httpServer });
  const subscriptions = new Map<WebSocket, Set<string>>();

  const stopListening = sessionManager.subscribe((event) => {
    fanOut(subscriptions, event);
  });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, subscriptions, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      stopListening();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Routes ────────────────────────────────────────────────────────────────

/** Forwards anything a handler throws, sync or async, to the error middleware. */
function route(handler: (req: Request, res: Response) => unknown): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function createSessionRouter(sessionManager: SessionManager): express.Router {
  const router = express.Router();

  router.post(
    "/",
    route((_req, res) => {
      const session = sessionManager.createSession();
      res.status(201).json({ sessionId: session.id, summary: sessionManager.summary(session.id) });
    }),
  );

  router.get(
    "/:id",
    route((req, res) => {
      res.json(sessionManager.summary(req.params.id));
    }),
  );

  router.delete(
    "/:id",
    route(async (req, res) => {
      await sessionManager.deleteSession(req.params.id);
      res.json({ deleted: true });
    }),
  );

  router.post(
    "/:id/observations",
    route(async (req, res) => {
      const observations = parseObservations(req.body);
      res.json(await sessionManager.loadObservations(req.params.id, observations));
    }),
  );

  router.post(
    "/:id/ingest",
    route(async (req, res) => {
      res.json(await sessionManager.ingestFeed(req.params.id));
    }),
  );

  router.get(
    "/:id/trajectories",
    route((req, res) => {
      res.json(sessionManager.effectiveTrajectories(req.params.id));
    }),
  );

  router.get(
    "/:id/anomalies",
    route((req, res) => {
      res.json(sessionManager.getAnomalies(req.params.id));
    }),
  );

  router.put(
    "/:id/corrections",
    route(async (req, res) => {
      const corrections = parseCorrections(req.body);
      const correctionCount = await sessionManager.submitCorrections(req.params.id, corrections);
      res.json({ acknowledged: true, correctionCount });
    }),
  );

  router.delete(
    "/:id/corrections",
    route(async (req, res) => {
      if (req.query.confirm !== "true") {
        throw new MalformedInputError("Resetting corrections requires ?confirm=true");
      }
      const cleared = await sessionManager.resetCorrections(req.params.id, { confirmed: true });
      res.json({ reset: true, cleared });
    }),
  );

  router.post(
    "/:id/calibration",
    route((req, res) => {
      const { measurement, calibration } = sessionManager.calibrate(req.params.id, parseCalibration(req.body));
      res.json({ lengthPx: measurement.lengthPx, controlPoints: measurement.controlPoints, ...calibration });
    }),
  );

  router.post(
    "/:id/force",
    route((req, res) => {
      const body = requireRecord(req.body, "Request body");
      const samples =
        typeof body.csv === "string"
          ? sessionManager.loadForceCsv(req.params.id, body.csv)
          : sessionManager.loadForceSamples(req.params.id, parseForceSamples(body.samples));
      res.json({ samples });
    }),
  );

  router.post(
    "/:id/stiffness",
    route((req, res) => {
      res.json(sessionManager.computeStiffness(req.params.id, parseStiffnessOptions(req.body)));
    }),
  );

  router.post(
    "/:id/save",
    route(async (req, res) => {
      res.json({ paths: await sessionManager.saveOutputs(req.params.id) });
    }),
  );

  return router;
}

function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isAnalysisError(err)) {
      res.status(err.status).json({ error: err.toPayload() });
      return;
    }
    // express.json() reports unparseable bodies as a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: new MalformedInputError(`Request body is not valid JSON: ${err.message}`).toPayload() });
      return;
    }
    logger.error(`${req.method} ${req.originalUrl} failed: ${err instanceof Error ? err.message : String(err)}`);
    res.status(500).json({ error: toErrorPayload(err) });
  };
}

// ─── Request Validation ─────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new MalformedInputError(`${what} must be a JSON object`);
  }
  return value;
}

function requireArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedInputError(`${what} must be an array`);
  }
  return value;
}

function requireNumber(value: unknown, what: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedInputError(`${what} must be a finite number`);
  }
  return value;
}

/** Like requireNumber but lets non-finite values through for the domain checks to reject. */
function requireNumeric(value: unknown, what: string): number {
  if (typeof value !== "number") {
    throw new MalformedInputError(`${what} must be a number`);
  }
  return value;
}

function requireSite(value: unknown, what: string): Site {
  const site = SITES.find((s) => s === value);
  if (!site) {
    throw new MalformedInputError(`${what} must be one of ${SITES.join(", ")}`);
  }
  return site;
}

function parsePoint(value: unknown, what: string): Point {
  const obj = requireRecord(value, what);
  return { x: requireNumber(obj.x, `${what}.x`), y: requireNumber(obj.y, `${what}.y`) };
}

/** Each site's list may omit frameIndex, in which case the position is used. */
export function parseObservations(body: unknown): SiteRecord<Observation[]> {
  const obj = requireRecord(body, "Request body");
  const parseSite = (site: Site): Observation[] =>
    requireArray(obj[site], site).map((entry, i) => {
      const point = parsePoint(entry, `${site}[${i}]`);
      const raw = requireRecord(entry, `${site}[${i}]`).frameIndex;
      const frameIndex = raw === undefined ? i : requireNumber(raw, `${site}[${i}].frameIndex`);
      return { frameIndex, ...point };
    });
  return { [Site.DISTAL]: parseSite(Site.DISTAL), [Site.PROXIMAL]: parseSite(Site.PROXIMAL) };
}

export function parseCorrections(body: unknown): Correction[] {
  const obj = requireRecord(body, "Request body");
  return requireArray(obj.corrections, "corrections").map((entry, i) => {
    const c = requireRecord(entry, `corrections[${i}]`);
    return {
      frameIndex: requireNumber(c.frameIndex, `corrections[${i}].frameIndex`),
      site: requireSite(c.site, `corrections[${i}].site`),
      ...parsePoint(c, `corrections[${i}]`),
    };
  });
}

export function parseCalibration(body: unknown): CalibrationRequest {
  const obj = requireRecord(body, "Request body");
  const extra = obj.extraPoints === undefined ? [] : requireArray(obj.extraPoints, "extraPoints");
  return {
    referenceFrame: requireNumber(obj.referenceFrame, "referenceFrame"),
    factorPxPerMm: requireNumeric(obj.factorPxPerMm, "factorPxPerMm"),
    // unplaced points arrive as null
    extraPoints: extra.filter((p) => p !== null).map((p, i) => parsePoint(p, `extraPoints[${i}]`)),
  };
}

export function parseForceSamples(value: unknown): ForceSample[] {
  return requireArray(value, "samples").map((entry, i) => {
    const s = requireRecord(entry, `samples[${i}]`);
    return {
      frameIndex: requireNumber(s.frameIndex, `samples[${i}].frameIndex`),
      torqueNm: requireNumber(s.torqueNm, `samples[${i}].torqueNm`),
    };
  });
}

export function parseStiffnessOptions(body: unknown): StiffnessOptions {
  if (body === undefined || (isRecord(body) && Object.keys(body).length === 0)) {
    return {};
  }
  const obj = requireRecord(body, "Request body");
  const options: StiffnessOptions = {};
  if (obj.tendonMomentArmM !== undefined) {
    options.tendonMomentArmM = requireNumeric(obj.tendonMomentArmM, "tendonMomentArmM");
  }
  if (obj.lowerLegMomentArmM !== undefined) {
    options.lowerLegMomentArmM = requireNumeric(obj.lowerLegMomentArmM, "lowerLegMomentArmM");
  }
  if (obj.applyLeverRatio !== undefined) {
    if (typeof obj.applyLeverRatio !== "boolean") {
      throw new MalformedInputError("applyLeverRatio must be a boolean");
    }
    options.applyLeverRatio = obj.applyLeverRatio;
  }
  if (obj.regressionRange !== undefined) {
    if (obj.regressionRange !== "full" && obj.regressionRange !== "tf80") {
      throw new MalformedInputError('regressionRange must be "full" or "tf80"');
    }
    options.regressionRange = obj.regressionRange;
  }
  return options;
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

export function parseClientMessage(text: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new MalformedInputError("Message is not valid JSON");
  }
  const obj = requireRecord(parsed, "Message");
  if ((obj.type === "subscribe" || obj.type === "unsubscribe") && typeof obj.sessionId === "string") {
    return { type: obj.type, sessionId: obj.sessionId };
  }
  throw new MalformedInputError('Expected {"type": "subscribe" | "unsubscribe", "sessionId": string}');
}

function handleConnection(
  ws: WebSocket,
  subscriptions: Map<WebSocket, Set<string>>,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const sessionIds = new Set<string>();
  subscriptions.set(ws, sessionIds);
  logger.info("New WebSocket connection");

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        throw new MalformedInputError("Binary frames are not supported");
      }
      const message = parseClientMessage(rawToText(data));
      switch (message.type) {
        case "subscribe": {
          const summary = sessionManager.summary(message.sessionId);
          sessionIds.add(message.sessionId);
          sendMessage(ws, { type: "subscribed", sessionId: message.sessionId, summary });
          break;
        }
        case "unsubscribe":
          sessionIds.delete(message.sessionId);
          sendMessage(ws, { type: "unsubscribed", sessionId: message.sessionId });
          break;
        default: {
          const exhaustiveCheck: never = message;
          throw new MalformedInputError(`Unknown message: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.warn(`Rejected WebSocket message: ${errorMessage}`);
      sendMessage(ws, { type: "protocol_error", message: errorMessage });
    }
  });

  ws.on("close", () => {
    subscriptions.delete(ws);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error: ${err.message}`);
    subscriptions.delete(ws);
  });
}

function rawToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return (data instanceof ArrayBuffer ? Buffer.from(data) : data).toString("utf-8");
}

function fanOut(subscriptions: Map<WebSocket, Set<string>>, event: SessionEvent): void {
  for (const [ws, sessionIds] of subscriptions) {
    if (sessionIds.has(event.sessionId)) {
      sendMessage(ws, event);
      if (event.type === "session_deleted") {
        sessionIds.delete(event.sessionId);
      }
    }
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
