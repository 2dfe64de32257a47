import http from "http";
import fs from "fs";
import type { Config } from "./config.js";
import type { PdfInfo, PdfTools } from "./pdf-tools.js";
import { receivePdfUpload } from "./uploads.js";
import type { PdfUpload } from "./uploads.js";
import { enqueueJob } from "./queue.js";
import { createTempPath, removeTempFiles } from "./temp-dir.js";
import { baseName, sendError, sendJson, sendPdf } from "./http.js";
import {
  HttpError,
  InvalidPasswordError,
  InvalidPdfError,
  QueueFullError,
  ToolUnavailableError,
} from "./errors.js";

export interface AppContext {
  config: Config;
  tools: PdfTools;
}

export interface CheckProtectedResponse {
  is_protected: boolean;
  requires_password: boolean;
  pages: number | null;
  method_used: "pdfinfo";
  message: string;
}

function toHttpError(error: unknown): unknown {
  if (error instanceof InvalidPdfError) {
    return new HttpError(400, "Unable to analyze PDF file");
  }
  if (error instanceof InvalidPasswordError) {
    return new HttpError(400, "Invalid password or unsupported encryption method");
  }
  if (error instanceof QueueFullError) {
    return new HttpError(503, "Server is busy, please retry shortly");
  }
  if (error instanceof ToolUnavailableError) {
    return new HttpError(503, "PDF tools are not available on this server");
  }
  return error;
}

function readPassword(upload: PdfUpload, field: string): string | undefined {
  const value = upload.fields[field];
  if (value === undefined || value === "") {
    return undefined;
  }
  // qpdf reads passwords line by line from stdin.
  if (/[\r\n]/.test(value)) {
    throw new HttpError(400, "Password must not contain line breaks");
  }
  return value;
}

function requirePassword(upload: PdfUpload): string {
  const password = readPassword(upload, "password");
  if (password === undefined) {
    throw new HttpError(400, "Password is required");
  }
  return password;
}

// A missing or unreadable output file means the tool did not produce a PDF,
// which is a server-side failure rather than a bad upload.
async function inspectOutput(tools: PdfTools, outputPath: string, failureDetail: string): Promise<PdfInfo> {
  try {
    return await tools.inspect(outputPath);
  } catch (error) {
    if (error instanceof InvalidPdfError) {
      throw new HttpError(500, failureDetail);
    }
    throw error;
  }
}

function uploadOptions(config: Config): { tempDir: string; maxUploadBytes: number } {
  return { tempDir: config.tempDir, maxUploadBytes: config.maxUploadBytes };
}

export async function handleCheckProtected(
  request: http.IncomingMessage,
  response: http.ServerResponse,
  context: AppContext,
): Promise<void> {
  let upload: PdfUpload | undefined;
  try {
    upload = await receivePdfUpload(request, uploadOptions(context.config));
    const inputPath = upload.storedPath;

    console.log(`[pdf-unlocker] Checking protection status for: ${upload.originalFilename}`);
    const info = await enqueueJob(() => context.tools.inspect(inputPath));

    const body: CheckProtectedResponse = {
      is_protected: info.encrypted,
      requires_password: info.requiresPassword,
      pages: info.pages ?? null,
      method_used: "pdfinfo",
      message: info.encrypted ? "PDF is password protected" : "PDF is not password protected",
    };
    console.log(`[pdf-unlocker] ${body.message}`);
    sendJson(response, 200, body);
  } catch (error) {
    sendError(response, toHttpError(error));
  } finally {
    if (upload !== undefined) {
      await removeTempFiles([upload.storedPath]);
    }
  }
}

export async function handleRemovePassword(
  request: http.IncomingMessage,
  response: http.ServerResponse,
  context: AppContext,
): Promise<void> {
  const { config, tools } = context;
  const outputPath = createTempPath(config.tempDir, "output");
  let upload: PdfUpload | undefined;

  try {
    upload = await receivePdfUpload(request, uploadOptions(config));
    const inputPath = upload.storedPath;
    const password = requirePassword(upload);

    console.log(`[pdf-unlocker] Processing file: ${upload.originalFilename}, Size: ${upload.size} bytes`);

    const data = await enqueueJob(async () => {
      const info = await tools.inspect(inputPath);
      if (!info.encrypted) {
        console.log("[pdf-unlocker] PDF is not encrypted, copying file...");
        await fs.promises.copyFile(inputPath, outputPath);
      } else {
        await tools.decrypt(inputPath, outputPath, password);
        console.log("[pdf-unlocker] Password accepted");
      }

      const result = await inspectOutput(tools, outputPath, "Failed to create unlocked PDF");
      if (result.encrypted) {
        console.warn("[pdf-unlocker] Output PDF is still encrypted");
        throw new HttpError(500, "Failed to remove password protection");
      }
      console.log("[pdf-unlocker] Verification successful: PDF is unlocked");

      return fs.promises.readFile(outputPath);
    });

    sendPdf(response, data, `${baseName(upload.originalFilename)}_unlocked.pdf`);
  } catch (error) {
    sendError(response, toHttpError(error));
  } finally {
    const paths = upload !== undefined ? [upload.storedPath, outputPath] : [outputPath];
    await removeTempFiles(paths);
  }
}

export async function handleAddPassword(
  request: http.IncomingMessage,
  response: http.ServerResponse,
  context: AppContext,
): Promise<void> {
  const { config, tools } = context;
  const outputPath = createTempPath(config.tempDir, "output");
  let upload: PdfUpload | undefined;

  try {
    upload = await receivePdfUpload(request, uploadOptions(config));
    const inputPath = upload.storedPath;
    const userPassword = requirePassword(upload);
    if ([...userPassword].length < config.minPasswordLength) {
      throw new HttpError(400, `Password must be at least ${config.minPasswordLength} characters long`);
    }
    const ownerPassword = readPassword(upload, "owner_password") ?? userPassword;

    console.log(`[pdf-unlocker] Adding password protection to: ${upload.originalFilename}, Size: ${upload.size} bytes`);

    const data = await enqueueJob(async () => {
      const info = await tools.inspect(inputPath);
      if (info.encrypted) {
        throw new HttpError(400, "PDF is already password protected. Please remove existing password first.");
      }

      await tools.encrypt(inputPath, outputPath, {
        userPassword,
        ownerPassword,
        keyBits: config.encryption.keyBits,
      });

      const result = await inspectOutput(tools, outputPath, "Failed to create protected PDF");
      if (!result.requiresPassword) {
        console.warn("[pdf-unlocker] Output PDF is not encrypted");
        throw new HttpError(500, "Failed to add password protection");
      }
      console.log("[pdf-unlocker] Verification successful: PDF is encrypted");

      return fs.promises.readFile(outputPath);
    });

    sendPdf(response, data, `${baseName(upload.originalFilename)}_protected.pdf`);
  } catch (error) {
    sendError(response, toHttpError(error));
  } finally {
    const paths = upload !== undefined ? [upload.storedPath, outputPath] : [outputPath];
    await removeTempFiles(paths);
  }
}
