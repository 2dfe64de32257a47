import http from "http";
import { Readable } from "stream";

// Shared request/response doubles for the HTTP-level tests.

export interface FilePart {
  fieldname: string;
  filename: string;
  contentType: string;
  data: Buffer;
}

const CRLF = "\r\n";

export function buildMultipartBody(
  boundary: string,
  parts: Array<{ name: string; value: string } | FilePart>,
): Buffer {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    if ("fieldname" in part) {
      chunks.push(
        Buffer.from(
          `--${boundary}${CRLF}` +
          `Content-Disposition: form-data; name="${part.fieldname}"; filename="${part.filename}"${CRLF}` +
          `Content-Type: ${part.contentType}${CRLF}` +
          `${CRLF}`,
        ),
        part.data,
        Buffer.from(CRLF),
      );
    } else {
      chunks.push(
        Buffer.from(
          `--${boundary}${CRLF}` +
          `Content-Disposition: form-data; name="${part.name}"${CRLF}` +
          `${CRLF}` +
          `${part.value}${CRLF}`,
        ),
      );
    }
  }

  chunks.push(Buffer.from(`--${boundary}--${CRLF}`));
  return Buffer.concat(chunks);
}

export function makeRequest(
  method: string,
  url: string,
  headers: Record<string, string> = {},
  body: Buffer = Buffer.alloc(0),
): http.IncomingMessage {
  const readable = Readable.from([body]);
  const request = Object.assign(readable, { headers, method, url });
  return request as unknown as http.IncomingMessage;
}

export function makeMultipartRequest(url: string, boundary: string, body: Buffer): http.IncomingMessage {
  return makeRequest(
    "POST",
    url,
    {
      "content-type": `multipart/form-data; boundary=${boundary}`,
      "content-length": String(body.length),
    },
    body,
  );
}

// A multipart request whose body is fed by the test; nothing ends it unless
// the test does.
export function makeOpenMultipartRequest(url: string, boundary: string): { request: http.IncomingMessage; stream: Readable } {
  const stream = new Readable({ read() {} });
  const headers = { "content-type": `multipart/form-data; boundary=${boundary}` };
  const request = Object.assign(stream, { headers, method: "POST", url });
  return { request: request as unknown as http.IncomingMessage, stream };
}

export class MockResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body: Buffer | undefined;
  headersSent = false;

  setHeader(name: string, value: string | number | readonly string[]): this {
    this.headers[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
    return this;
  }

  getHeader(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  writeHead(status: number, headers: Record<string, string> = {}): this {
    this.statusCode = status;
    for (const [name, value] of Object.entries(headers)) {
      this.setHeader(name, value);
    }
    this.headersSent = true;
    return this;
  }

  end(chunk?: string | Buffer): this {
    this.headersSent = true;
    if (chunk !== undefined) {
      this.body = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    }
    return this;
  }

  json(): unknown {
    return JSON.parse(this.body?.toString("utf-8") ?? "null");
  }

  asServerResponse(): http.ServerResponse {
    return this as unknown as http.ServerResponse;
  }
}
