import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { createLogger } from "../shared/logger.js";
import type { AppContext } from "../shared/context.js";
import {
  getHealth,
  getOutput,
  getPageState,
  listInstances,
  sendInput,
  switchInstance,
} from "./api.js";
import type { ApiResponse } from "./api.js";
import { getPageHtml } from "./page.js";

const log = createLogger("web");

/** Request bodies are tiny JSON objects; anything larger is refused */
const MAX_BODY_BYTES = 64 * 1024;

class BadRequestError extends Error {}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Cache-Control": "no-cache",
  });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BadRequestError("Request body too large");
    chunks.push(buf);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new BadRequestError("Invalid JSON body");
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new BadRequestError("Expected a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

async function route(
  ctx: AppContext,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const pane = url.searchParams.get("pane");
  const reply = ({ status, body }: ApiResponse) => sendJson(res, status, body);

  if (req.method === "GET" && url.pathname === "/") {
    const html = getPageHtml(await getPageState(ctx, pane));
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(html);
    return;
  }

  if (req.method === "GET" && url.pathname === "/api/output") {
    sendJson(res, 200, await getOutput(ctx, pane));
    return;
  }

  if (req.method === "POST" && url.pathname === "/api/send") {
    reply(await sendInput(ctx, await readJsonBody(req)));
    return;
  }

  if (req.method === "GET" && url.pathname === "/api/instances") {
    reply(await listInstances(ctx, pane));
    return;
  }

  if (req.method === "POST" && url.pathname === "/api/switch") {
    reply(await switchInstance(ctx, await readJsonBody(req)));
    return;
  }

  if (req.method === "GET" && url.pathname === "/health") {
    reply(await getHealth(ctx));
    return;
  }

  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end("Not found");
}

export function createWebServer(ctx: AppContext): Server {
  return createServer((req, res) => {
    route(ctx, req, res).catch((err: unknown) => {
      if (err instanceof BadRequestError) {
        sendJson(res, 400, { error: err.message });
        return;
      }
      log.error("Request failed", {
        method: req.method,
        url: req.url,
        error: String(err),
      });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });
}

/** Bind `server`, rejecting on bind errors such as EADDRINUSE */
export function listenOn(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}
