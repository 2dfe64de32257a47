import http from "http";
import fs from "fs";
import busboy from "busboy";
import { HttpError } from "./errors.js";
import { createTempPath } from "./temp-dir.js";

export interface PdfUpload {
  storedPath: string;
  originalFilename: string;
  size: number;
  fields: Record<string, string>;
}

export interface UploadOptions {
  tempDir: string;
  maxUploadBytes: number;
}

export function isPdfFilename(filename: string): boolean {
  return filename.toLowerCase().endsWith(".pdf");
}

async function saveUpload(data: Buffer, tempDir: string): Promise<string> {
  const storedPath = createTempPath(tempDir, "input");
  await fs.promises.writeFile(storedPath, data);
  return storedPath;
}

function createParser(request: http.IncomingMessage, maxUploadBytes: number): busboy.Busboy {
  try {
    return busboy({ headers: request.headers, limits: { fileSize: maxUploadBytes } });
  } catch {
    // busboy throws synchronously on a missing or non-multipart Content-Type.
    throw new HttpError(400, "Request must be multipart/form-data");
  }
}

// Parses a multipart upload carrying one PDF in the "file" field. The file is
// written to the temp directory; the caller owns storedPath and must remove it.
export async function receivePdfUpload(request: http.IncomingMessage, options: UploadOptions): Promise<PdfUpload> {
  const bb = createParser(request, options.maxUploadBytes);

  const fields: Record<string, string> = {};
  let originalFilename: string | undefined;
  let storedPath: string | undefined;
  let fileSize = 0;
  let fileFieldSeen = false;
  let truncated = false;

  const parsePromise = new Promise<void>((resolve, reject) => {
    // Both the file write and busboy's own parsing must be done before
    // resolving, so fields that follow the file part are captured too.
    let writeFinished = false;
    let busboyFinished = false;

    function maybeResolve(): void {
      if (writeFinished && busboyFinished) {
        resolve();
      }
    }

    bb.on("file", (fieldname, fileStream, info) => {
      if (fieldname !== "file" || fileFieldSeen) {
        fileStream.resume();
        return;
      }

      fileFieldSeen = true;
      originalFilename = info.filename;

      if (!isPdfFilename(info.filename)) {
        fileStream.resume();
        writeFinished = true;
        return;
      }

      const chunks: Buffer[] = [];

      fileStream.on("data", (chunk: Buffer) => {
        fileSize += chunk.length;
        chunks.push(chunk);
      });

      fileStream.on("limit", () => {
        truncated = true;
      });

      fileStream.on("end", () => {
        if (truncated) {
          writeFinished = true;
          maybeResolve();
          return;
        }
        saveUpload(Buffer.concat(chunks), options.tempDir)
          .then((savedPath) => {
            storedPath = savedPath;
            writeFinished = true;
            maybeResolve();
          })
          .catch(reject);
      });

      fileStream.on("error", reject);
    });

    bb.on("field", (fieldname, value) => {
      fields[fieldname] = value;
    });

    bb.on("error", reject);

    // busboy never finishes when the client goes away mid-body.
    request.on("aborted", () => {
      reject(new Error("Request aborted by client"));
    });
    request.on("error", reject);

    bb.on("finish", () => {
      busboyFinished = true;
      if (!fileFieldSeen) {
        resolve();
      } else {
        maybeResolve();
      }
    });
  });

  request.pipe(bb);

  try {
    await parsePromise;
  } catch (error) {
    if (storedPath !== undefined) {
      await fs.promises.rm(storedPath, { force: true });
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new HttpError(400, `Malformed upload: ${errorMessage}`);
  }

  if (!fileFieldSeen || originalFilename === undefined) {
    throw new HttpError(400, "Missing required 'file' field");
  }
  if (!isPdfFilename(originalFilename)) {
    throw new HttpError(400, "File must be a PDF");
  }
  if (truncated) {
    throw new HttpError(413, `File exceeds the maximum upload size of ${options.maxUploadBytes} bytes`);
  }
  if (storedPath === undefined) {
    throw new HttpError(500, "Failed to store upload");
  }

  console.log(`[pdf-unlocker] Received ${originalFilename} (${fileSize} bytes) as ${storedPath}`);

  return { storedPath, originalFilename, size: fileSize, fields };
}
