import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import type { LogLevel } from "../../src/config";
import { Logger } from "../../src/logger";

export type FixtureRoute = {
  status?: number;
  body: string | Buffer;
  headers?: Record<string, string>;
};

export type RecordedRequest = {
  url: string;
  authorization?: string;
  userAgent?: string;
};

export interface FixtureServer {
  baseUrl: string;
  requests: RecordedRequest[];
  route: (url: string, route: FixtureRoute) => void;
  json: (url: string, payload: unknown, headers?: Record<string, string>) => void;
  close: () => Promise<void>;
}

/** Serves registered routes by exact request URL (path plus query); anything else is a 404. */
export function startFixtureServer(): Promise<FixtureServer> {
  const routes = new Map<string, FixtureRoute>();
  const requests: RecordedRequest[] = [];

  const server = http.createServer((req, res) => {
    const url = req.url ?? "/";
    requests.push({
      url,
      ...(req.headers.authorization ? { authorization: req.headers.authorization } : {}),
      ...(req.headers["user-agent"] ? { userAgent: req.headers["user-agent"] } : {})
    });
    const route = routes.get(url);
    if (!route) {
      res.writeHead(404, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ message: "Not Found" }));
      return;
    }
    res.writeHead(route.status ?? 200, route.headers ?? {});
    res.end(route.body);
  });

  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        throw new Error("Failed to start server");
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        requests,
        route: (url, route) => {
          routes.set(url, route);
        },
        json: (url, payload, headers = {}) => {
          routes.set(url, {
            body: JSON.stringify(payload),
            headers: { "Content-Type": "application/json", ...headers }
          });
        },
        close: () =>
          new Promise((closeResolve) => {
            server.closeAllConnections();
            server.close(() => closeResolve());
          })
      });
    });
  });
}

export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `tapwright-${label}-`));
}

export type CapturedLine = { level: LogLevel; line: string };

export function captureLogger(level: LogLevel = "debug"): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger(level, { sink: (entryLevel, line) => lines.push({ level: entryLevel, line }) });
  return { logger, lines };
}
