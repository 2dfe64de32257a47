import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { receivePdfUpload, isPdfFilename } from "./uploads.js";
import { HttpError } from "./errors.js";
import { buildMultipartBody, makeMultipartRequest, makeOpenMultipartRequest, makeRequest } from "./test-support.js";
import type { FilePart } from "./test-support.js";

const BOUNDARY = "pdfboundary";
const PDF_BYTES = Buffer.from("%PDF-1.7\n%fake test document\n%%EOF\n");

let tempDir: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pdf-unlocker-uploads-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe("isPdfFilename", () => {
  it("matches the extension case-insensitively", () => {
    expect(isPdfFilename("report.PDF")).toBe(true);
    expect(isPdfFilename("report.pdf")).toBe(true);
    expect(isPdfFilename("report.pdf.txt")).toBe(false);
  });
});

const URL_PATH = "/api/remove-password";

function pdfFile(filename: string, data: Buffer = PDF_BYTES): FilePart {
  return { fieldname: "file", filename, contentType: "application/pdf", data };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(() => undefined, (rejection: unknown) => rejection);
}

describe("receivePdfUpload", () => {
  it("stores the file and returns its fields", async () => {
    const body = buildMultipartBody(BOUNDARY, [
      { name: "password", value: "test-secret" },
      pdfFile("report.pdf"),
    ]);

    const upload = await receivePdfUpload(makeMultipartRequest(URL_PATH, BOUNDARY, body), { tempDir, maxUploadBytes: 1024 });

    expect(upload.originalFilename).toBe("report.pdf");
    expect(upload.size).toBe(PDF_BYTES.length);
    expect(upload.fields).toEqual({ password: "test-secret" });
    expect(path.dirname(upload.storedPath)).toBe(tempDir);
    expect(path.basename(upload.storedPath)).toMatch(/^input-[0-9a-f-]{36}\.pdf$/);
    expect(await fs.readFile(upload.storedPath)).toEqual(PDF_BYTES);
  });

  it("captures fields that follow the file part", async () => {
    const body = buildMultipartBody(BOUNDARY, [
      pdfFile("report.pdf"),
      { name: "password", value: "open-me" },
      { name: "owner_password", value: "owner-pass" },
    ]);

    const upload = await receivePdfUpload(makeMultipartRequest(URL_PATH, BOUNDARY, body), { tempDir, maxUploadBytes: 1024 });

    expect(upload.fields).toEqual({ password: "open-me", owner_password: "owner-pass" });
  });

  it("drains other file fields sent before the file part", async () => {
    const body = buildMultipartBody(BOUNDARY, [
      { fieldname: "thumbnail", filename: "thumb.png", contentType: "image/png", data: Buffer.from("png-bytes") },
      pdfFile("a.pdf"),
    ]);

    const upload = await receivePdfUpload(makeMultipartRequest(URL_PATH, BOUNDARY, body), { tempDir, maxUploadBytes: 1024 });

    expect(upload.originalFilename).toBe("a.pdf");
    expect(await fs.readFile(upload.storedPath)).toEqual(PDF_BYTES);
    expect(await fs.readdir(tempDir)).toEqual([path.basename(upload.storedPath)]);
  });

  it("rejects a request without a file part", async () => {
    const body = buildMultipartBody(BOUNDARY, [{ name: "password", value: "test-secret" }]);

    const error = await rejectionOf(
      receivePdfUpload(makeMultipartRequest(URL_PATH, BOUNDARY, body), { tempDir, maxUploadBytes: 1024 }),
    );

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 400, detail: "Missing required 'file' field" });
  });

  it("rejects a file that is not a PDF without storing it", async () => {
    const body = buildMultipartBody(BOUNDARY, [
      { fieldname: "file", filename: "notes.txt", contentType: "text/plain", data: Buffer.from("hi") },
    ]);

    const error = await rejectionOf(
      receivePdfUpload(makeMultipartRequest(URL_PATH, BOUNDARY, body), { tempDir, maxUploadBytes: 1024 }),
    );

    expect(error).toMatchObject({ status: 400, detail: "File must be a PDF" });
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("rejects a file larger than the limit with 413", async () => {
    const body = buildMultipartBody(BOUNDARY, [pdfFile("big.pdf", Buffer.alloc(64, 0x41))]);

    const error = await rejectionOf(
      receivePdfUpload(makeMultipartRequest(URL_PATH, BOUNDARY, body), { tempDir, maxUploadBytes: 16 }),
    );

    expect(error).toMatchObject({ status: 413, detail: "File exceeds the maximum upload size of 16 bytes" });
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("rejects a request that is not multipart", async () => {
    const request = makeRequest("POST", URL_PATH, { "content-type": "application/json" }, Buffer.from("{}"));

    const error = await rejectionOf(receivePdfUpload(request, { tempDir, maxUploadBytes: 1024 }));

    expect(error).toMatchObject({ status: 400, detail: "Request must be multipart/form-data" });
  });

  it("rejects when the client aborts mid-upload", async () => {
    const { request, stream } = makeOpenMultipartRequest(URL_PATH, BOUNDARY);
    stream.push(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="a.pdf"\r\n\r\n%PDF-1.7\n`);

    const pending = rejectionOf(receivePdfUpload(request, { tempDir, maxUploadBytes: 1024 }));
    stream.emit("aborted");
    const error = await pending;

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 400, detail: "Malformed upload: Request aborted by client" });
  });

  it("rejects when the request stream fails", async () => {
    const { request, stream } = makeOpenMultipartRequest(URL_PATH, BOUNDARY);
    stream.push(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="a.pdf"\r\n\r\n%PDF-1.7\n`);

    const pending = rejectionOf(receivePdfUpload(request, { tempDir, maxUploadBytes: 1024 }));
    stream.destroy(new Error("socket hang up"));
    const error = await pending;

    expect(error).toMatchObject({ status: 400, detail: "Malformed upload: socket hang up" });
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
