import type { IncomingMessage, ServerResponse } from "node:http";
import http from "node:http";
import type { DocumentStateReader } from "./document-state.js";
import { BindError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface PreviewServer {
  url: string;
  host: string;
  port: number;
  close(): Promise<void>;
}

export interface CreatePreviewServerOptions {
  state: DocumentStateReader;
  host: string;
  /** `0` lets the OS pick a free port. */
  port: number;
  logger?: Logger;
}

const NO_CACHE = "no-cache, no-store, must-revalidate";

export async function createPreviewServer(
  options: CreatePreviewServerOptions,
): Promise<PreviewServer> {
  const { state, host } = options;
  const logger = options.logger ?? console;
  const server = http.createServer((req, res) => {
    handleRequest(state, req, res);
  });

  const port: number = await new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(new BindError(host, options.port, error));
    };
    server.once("error", onError);
    server.listen(options.port, host, () => {
      server.off("error", onError);
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("Unable to determine server port"));
      }
    });
  });

  server.on("error", (error) => {
    logger.error(`[mdpeek] Server error: ${error.message}`);
  });

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      server.closeAllConnections();
    });
  };

  return {
    url: formatUrl(host, port),
    host,
    port,
    close,
  };
}

/**
 * Routes one request against the current snapshot. The snapshot is read
 * once per request, so the page body and its version header always belong
 * to the same commit.
 */
export function handleRequest(
  state: DocumentStateReader,
  req: IncomingMessage,
  res: ServerResponse,
): void {
  if (req.method !== "GET" || !req.url) {
    notFound(res);
    return;
  }

  let requestUrl: URL;
  try {
    requestUrl = new URL(req.url, "http://127.0.0.1");
  } catch {
    notFound(res);
    return;
  }

  const snapshot = state.currentSnapshot();

  switch (requestUrl.pathname) {
    case "/": {
      res.writeHead(200, {
        "content-type": "text/html; charset=utf-8",
        "cache-control": NO_CACHE,
        "x-document-version": String(snapshot.version),
      });
      res.end(snapshot.html);
      return;
    }
    case "/updates": {
      const since = parseSince(requestUrl.searchParams.get("since"));
      if (snapshot.version <= since) {
        notFound(res);
        return;
      }
      res.writeHead(200, {
        "content-type": "application/json; charset=utf-8",
        "cache-control": NO_CACHE,
      });
      res.end(JSON.stringify({ version: snapshot.version }));
      return;
    }
    default: {
      notFound(res);
    }
  }
}

/**
 * Anything that is not a non-negative integer counts as `0`. Integers past
 * the safe range clamp to `Number.MAX_SAFE_INTEGER`.
 */
export function parseSince(value: string | null): number {
  if (value === null || !/^\d+$/.test(value)) {
    return 0;
  }
  const since = Number(value);
  return Number.isSafeInteger(since) ? since : Number.MAX_SAFE_INTEGER;
}

function notFound(res: ServerResponse): void {
  res.writeHead(404, {
    "content-type": "text/plain; charset=utf-8",
    "cache-control": NO_CACHE,
  });
  res.end();
}

function formatUrl(host: string, port: number): string {
  const hostname = host.includes(":") ? `[${host}]` : host;
  return `http://${hostname}:${port}/`;
}
