import http from "http";
import cors from "cors";
import type { CorsOptions } from "cors";
import { getQueueStats } from "./queue.js";
import { sendError, sendJson } from "./http.js";
import { handleAddPassword, handleCheckProtected, handleRemovePassword } from "./pdf-routes.js";
import type { AppContext } from "./pdf-routes.js";

export const SERVICE_NAME = "pdf-unlocker";
export const SERVICE_VERSION = "1.0.0";

type CorsHandler = ReturnType<typeof cors>;

export function buildCorsOptions(allowedOrigins: string[]): CorsOptions {
  return {
    // A wildcard entry reflects the caller's origin so credentials still work.
    origin: allowedOrigins.includes("*") ? true : allowedOrigins,
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
    exposedHeaders: ["Content-Disposition"],
    // The router answers preflight requests itself.
    preflightContinue: true,
  };
}

function applyCors(corsHandler: CorsHandler, request: http.IncomingMessage, response: http.ServerResponse): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    corsHandler(request, response, (error?: unknown) => {
      if (error !== undefined && error !== null) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

function handleRoot(response: http.ServerResponse): void {
  sendJson(response, 200, {
    message: "PDF Unlocker API is running!",
    version: SERVICE_VERSION,
    tools: ["pdfinfo", "qpdf"],
    endpoints: {
      remove_password: "/api/remove-password",
      add_password: "/api/add-password",
      check_protected: "/api/check-protected",
      health: "/api/health",
    },
  });
}

async function handleHealth(response: http.ServerResponse, context: AppContext): Promise<void> {
  const tools = await context.tools.probe();
  const healthy = tools.every((tool) => tool.available);
  sendJson(response, healthy ? 200 : 503, {
    status: healthy ? "healthy" : "degraded",
    service: SERVICE_NAME,
    tools,
    queue: getQueueStats(),
  });
}

export async function handleRequest(
  request: http.IncomingMessage,
  response: http.ServerResponse,
  context: AppContext,
  corsHandler: CorsHandler,
): Promise<void> {
  try {
    await applyCors(corsHandler, request, response);

    const url = new URL(request.url || "/", "http://localhost");
    const pathname = url.pathname;
    const method = request.method ?? "GET";

    if (method === "OPTIONS") {
      response.writeHead(204, { "Content-Length": "0" });
      response.end();
    } else if (method === "GET" && pathname === "/") {
      handleRoot(response);
    } else if (method === "GET" && pathname === "/api/health") {
      await handleHealth(response, context);
    } else if (method === "POST" && pathname === "/api/check-protected") {
      await handleCheckProtected(request, response, context);
    } else if (method === "POST" && pathname === "/api/remove-password") {
      await handleRemovePassword(request, response, context);
    } else if (method === "POST" && pathname === "/api/add-password") {
      await handleAddPassword(request, response, context);
    } else {
      sendJson(response, 404, { detail: "Not found" });
    }
  } catch (error) {
    console.error("[pdf-unlocker] Error handling request:", error);
    sendError(response, error);
  }
}

// The server-invocable application object: a plain request listener.
export function createApp(context: AppContext): http.RequestListener {
  const corsHandler = cors(buildCorsOptions(context.config.allowedOrigins));

  return (request: http.IncomingMessage, response: http.ServerResponse): void => {
    const startedAt = Date.now();
    response.on("finish", () => {
      console.log(
        `[pdf-unlocker] ${request.method} ${request.url} ${response.statusCode} ${Date.now() - startedAt}ms`,
      );
    });
    void handleRequest(request, response, context, corsHandler);
  };
}
