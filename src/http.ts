import http from "http";
import path from "path";
import { HttpError } from "./errors.js";

export function sendJson(response: http.ServerResponse, status: number, body: unknown): void {
  response.writeHead(status, { "Content-Type": "application/json" });
  response.end(JSON.stringify(body));
}

export function sendError(response: http.ServerResponse, error: unknown): void {
  if (response.headersSent) {
    console.error("[pdf-unlocker] Error after response started:", error);
    return;
  }
  if (error instanceof HttpError) {
    sendJson(response, error.status, { detail: error.detail });
    return;
  }
  console.error("[pdf-unlocker] Unexpected error:", error);
  const errorMessage = error instanceof Error ? error.message : String(error);
  sendJson(response, 500, { detail: `Processing failed: ${errorMessage}` });
}

// Client filenames may carry a directory (old browsers send full paths) and
// any casing of the extension.
export function baseName(originalFilename: string): string {
  const withoutDirectory = path.basename(originalFilename.replace(/\\/g, "/"));
  const stripped = withoutDirectory.replace(/\.pdf$/i, "");
  return stripped === "" ? "document" : stripped;
}

export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\%]/g, "_");
  const encoded = encodeURIComponent(filename).replace(/['()*]/g, (character) =>
    `%${character.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

export function sendPdf(response: http.ServerResponse, data: Buffer, filename: string): void {
  response.writeHead(200, {
    "Content-Type": "application/pdf",
    "Content-Length": String(data.length),
    "Content-Disposition": contentDisposition(filename),
  });
  response.end(data);
}
