import http from "http";
import type { AddressInfo } from "net";
import { timingSafeEqual } from "crypto";
import { toError } from "../errors/app.errors";
import type { PreflightReport } from "../bot/types";
import type { LogBuffer, Logger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";
import { isRepresentableEnvValue, readEnvFile, updateEnvFile } from "./env-file";

/**
 * What the control surface can ask of the running bot.
 */
export interface BotController {
  status: () => Record<string, unknown>;
  start: () => void;
  stop: () => void;
  restart: () => Promise<void>;
  preflight: () => Promise<PreflightReport>;
}

export type ControlServerOptions = {
  token: string;
  bind: string;
  port: number;
  logLinesDefault: number;
  logLinesMax: number;
  envFile?: string;
  envAllowlist: readonly string[];
};

const MAX_BODY_BYTES = 64 * 1024;

type JsonBody = Record<string, unknown> | unknown[];

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
  ) {
    super(code);
  }
}

export function clampLogLines(raw: string | null, fallback: number, max: number): number {
  const parsed = raw === null ? NaN : Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return Math.min(fallback, max);
  return Math.min(parsed, max);
}

const tokensMatch = (expected: string, supplied: string | undefined): boolean => {
  if (!supplied) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(supplied);
  return a.length === b.length && timingSafeEqual(a, b);
};

const suppliedToken = (req: http.IncomingMessage): string | undefined => {
  const auth = req.headers.authorization;
  if (auth && /^bearer\s+/i.test(auth)) return auth.replace(/^bearer\s+/i, "").trim();
  const header = req.headers["x-control-token"];
  return Array.isArray(header) ? header[0] : header;
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new HttpError(413, "body_too_large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });

/**
 * Token-authenticated HTTP control surface for a running bot.
 */
export class ControlServer {
  private readonly options: ControlServerOptions;
  private readonly controller: BotController;
  private readonly logs: LogBuffer;
  private readonly logger: Logger;
  private server: http.Server | null = null;

  constructor(params: {
    options: ControlServerOptions;
    controller: BotController;
    logs: LogBuffer;
    logger: Logger;
  }) {
    this.options = params.options;
    this.controller = params.controller;
    this.logs = params.logs;
    this.logger = params.logger;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      const current = this.server.address();
      if (current && typeof current !== "string") return current;
    }
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        this.logger.error("[Control] Request handler crashed", toError(err));
        if (!res.headersSent) this.send(res, 500, { error: "internal_error" });
      });
    });
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.bind, () => {
        server.off("error", reject);
        resolve();
      });
    });
    server.on("error", (err: NodeJS.ErrnoException) => {
      this.logger.error(`[Control] Server error (${err.code ?? "unknown"})`, err);
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Control server did not bind to a TCP address");
    }
    this.logger.info(`[Control] Listening on ${address.address}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (!tokensMatch(this.options.token, suppliedToken(req))) {
      this.send(res, 401, { error: "unauthorized" });
      return;
    }

    const url = new URL(req.url ?? "/", "http://control.local");
    const route = `${req.method ?? "GET"} ${url.pathname}`;
    try {
      switch (route) {
        case "GET /status":
          this.send(res, 200, this.controller.status());
          return;
        case "POST /start":
          this.controller.start();
          this.send(res, 200, this.controller.status());
          return;
        case "POST /stop":
          this.controller.stop();
          this.send(res, 200, this.controller.status());
          return;
        case "POST /restart":
          await this.controller.restart();
          this.send(res, 200, this.controller.status());
          return;
        case "POST /preflight": {
          const report = await this.controller.preflight();
          this.send(res, report.ok ? 200 : 502, report);
          return;
        }
        case "GET /logs": {
          const lines = clampLogLines(
            url.searchParams.get("lines"),
            this.options.logLinesDefault,
            this.options.logLinesMax,
          );
          this.send(res, 200, { lines: this.logs.tail(lines) });
          return;
        }
        case "GET /logs/stream":
          this.streamLogs(
            res,
            clampLogLines(url.searchParams.get("lines"), this.options.logLinesDefault, this.options.logLinesMax),
          );
          return;
        case "GET /env":
          this.send(res, 200, this.envPayload(await this.readEnv()));
          return;
        case "POST /env":
          this.send(res, 200, this.envPayload(await this.writeEnv(req)));
          return;
        default:
          this.send(res, 404, { error: "not_found" });
      }
    } catch (err) {
      if (err instanceof HttpError) {
        this.send(res, err.status, { error: err.code });
        return;
      }
      this.logger.warn(`[Control] ${route} failed: ${sanitizeErrorMessage(err)}`);
      this.send(res, 500, { error: sanitizeErrorMessage(err) });
    }
  }

  /**
   * Server-sent events: the current tail first, then each new line as a
   * `data:` frame until the client disconnects.
   */
  private streamLogs(res: http.ServerResponse, lines: number): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-store",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    const write = (line: string): void => {
      res.write(`data: ${line}\n\n`);
    };
    for (const line of this.logs.tail(lines)) write(line);
    const unsubscribe = this.logs.subscribe(write);
    res.on("close", unsubscribe);
  }

  private envConfigured(): string {
    const { envFile, envAllowlist } = this.options;
    if (!envFile || envAllowlist.length === 0) {
      throw new HttpError(404, "env_not_configured");
    }
    return envFile;
  }

  private async readEnv(): Promise<Record<string, string>> {
    return readEnvFile(this.envConfigured(), this.options.envAllowlist);
  }

  private async writeEnv(req: http.IncomingMessage): Promise<Record<string, string>> {
    const envFile = this.envConfigured();
    const body = await readBody(req);
    let payload: unknown;
    try {
      payload = body ? JSON.parse(body) : {};
    } catch {
      throw new HttpError(400, "invalid_json");
    }
    const updates =
      typeof payload === "object" && payload !== null && "updates" in payload
        ? payload.updates
        : {};
    if (typeof updates !== "object" || updates === null || Array.isArray(updates)) {
      throw new HttpError(400, "invalid_updates");
    }
    const allowed = new Set(this.options.envAllowlist);
    const filtered: Record<string, string> = {};
    for (const [key, value] of Object.entries(updates)) {
      if (allowed.has(key)) filtered[key] = String(value);
    }
    if (Object.values(filtered).some((value) => !isRepresentableEnvValue(value))) {
      throw new HttpError(400, "invalid_value");
    }
    if (Object.keys(filtered).length === 0) {
      throw new HttpError(400, "no_allowed_updates");
    }
    this.logger.info(`[Control] Updating ${envFile}: ${Object.keys(filtered).sort().join(", ")}`);
    return updateEnvFile(envFile, filtered, this.options.envAllowlist);
  }

  private envPayload(env: Record<string, string>): JsonBody {
    return {
      env,
      path: this.options.envFile,
      allowlist: [...this.options.envAllowlist].sort(),
    };
  }

  private send(res: http.ServerResponse, status: number, body: JsonBody | PreflightReport): void {
    res.writeHead(status, { "Content-Type": "application/json", "Cache-Control": "no-store" });
    res.end(JSON.stringify(body));
  }
}
