import { describe, it, expect, vi, afterEach } from "vitest";
import { baseName, contentDisposition, sendError } from "./http.js";
import { HttpError } from "./errors.js";
import { MockResponse } from "./test-support.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("baseName", () => {
  it("strips the extension in any case", () => {
    expect(baseName("Report.PDF")).toBe("Report");
    expect(baseName("archive.pdf.pdf")).toBe("archive.pdf");
  });

  it("drops directories sent by the client", () => {
    expect(baseName("C:\\Users\\me\\Report.Pdf")).toBe("Report");
    expect(baseName("../../etc/passwd.pdf")).toBe("passwd");
  });

  it("falls back to a generic name when nothing is left", () => {
    expect(baseName(".pdf")).toBe("document");
  });
});

describe("contentDisposition", () => {
  it("keeps plain ASCII names as they are", () => {
    expect(contentDisposition("report_unlocked.pdf")).toBe(
      "attachment; filename=\"report_unlocked.pdf\"; filename*=UTF-8''report_unlocked.pdf",
    );
  });

  it("adds an ASCII fallback for non-ASCII names", () => {
    expect(contentDisposition("résumé_unlocked.pdf")).toBe(
      "attachment; filename=\"r_sum__unlocked.pdf\"; filename*=UTF-8''r%C3%A9sum%C3%A9_unlocked.pdf",
    );
  });

  it("neutralises quotes in the fallback", () => {
    expect(contentDisposition("a\"b.pdf")).toBe("attachment; filename=\"a_b.pdf\"; filename*=UTF-8''a%22b.pdf");
  });
});

describe("sendError", () => {
  it("renders HttpError as a detail body", () => {
    const response = new MockResponse();

    sendError(response.asServerResponse(), new HttpError(413, "Too large"));

    expect(response.statusCode).toBe(413);
    expect(response.json()).toEqual({ detail: "Too large" });
  });

  it("does nothing once the response has started", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const response = new MockResponse();
    response.writeHead(200);

    sendError(response.asServerResponse(), new Error("late failure"));

    expect(response.statusCode).toBe(200);
    expect(response.body).toBeUndefined();
  });
});
