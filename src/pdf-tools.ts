import type { KeyBits, ToolsConfig } from "./config.js";
import { runCommand } from "./command.js";
import type { CommandResult, CommandRunner } from "./command.js";
import { InvalidPasswordError, InvalidPdfError, PdfToolError, ToolUnavailableError } from "./errors.js";

// qpdf: 0 = success, 2 = error, 3 = success with warnings.
const QPDF_EXIT_WARNINGS = 3;

const METADATA_KEYS = [
  "Title",
  "Author",
  "Subject",
  "Keywords",
  "Creator",
  "Producer",
  "CreationDate",
  "ModDate",
];

export interface PdfInfo {
  encrypted: boolean;
  // True when the document cannot be opened without a password. A PDF can be
  // encrypted with only an owner password, in which case this is false.
  requiresPassword: boolean;
  pages: number | undefined;
  pdfVersion: string | undefined;
  metadata: Record<string, string>;
}

export interface EncryptOptions {
  userPassword: string;
  ownerPassword: string;
  keyBits: KeyBits;
}

export interface ToolStatus {
  name: string;
  available: boolean;
  version?: string;
}

export interface PdfTools {
  inspect(filePath: string): Promise<PdfInfo>;
  decrypt(inputPath: string, outputPath: string, password: string): Promise<void>;
  encrypt(inputPath: string, outputPath: string, options: EncryptOptions): Promise<void>;
  probe(): Promise<ToolStatus[]>;
}

export function parsePdfInfo(stdout: string): PdfInfo {
  const fields = new Map<string, string>();
  for (const line of stdout.split(/\r?\n/)) {
    const colonIndex = line.indexOf(":");
    if (colonIndex <= 0) {
      continue;
    }
    const key = line.slice(0, colonIndex).trim();
    if (!fields.has(key)) {
      fields.set(key, line.slice(colonIndex + 1).trim());
    }
  }

  const pagesField = fields.get("Pages");
  const pages = pagesField !== undefined && /^\d+$/.test(pagesField) ? parseInt(pagesField, 10) : undefined;

  const metadata: Record<string, string> = {};
  for (const key of METADATA_KEYS) {
    const value = fields.get(key);
    if (value !== undefined && value !== "") {
      metadata[key] = value;
    }
  }

  return {
    encrypted: fields.get("Encrypted")?.startsWith("yes") ?? false,
    requiresPassword: false,
    pages,
    pdfVersion: fields.get("PDF version"),
    metadata,
  };
}

function firstLine(text: string): string | undefined {
  const line = text.split(/\r?\n/).find((candidate) => candidate.trim() !== "");
  return line?.trim();
}

function succeeded(result: CommandResult, allowWarnings: boolean): boolean {
  return result.exitCode === 0 || (allowWarnings && result.exitCode === QPDF_EXIT_WARNINGS);
}

export function createPdfTools(config: ToolsConfig, runner: CommandRunner = runCommand): PdfTools {
  const timeoutSeconds = config.timeoutSeconds;

  async function inspect(filePath: string): Promise<PdfInfo> {
    const result = await runner(config.pdfinfo, [filePath], { timeoutSeconds });

    if (result.exitCode === 0) {
      return parsePdfInfo(result.stdout);
    }
    if (result.timedOut) {
      throw new PdfToolError(config.pdfinfo, null, result.stderr);
    }
    if (result.stderr.includes("Incorrect password")) {
      return {
        encrypted: true,
        requiresPassword: true,
        pages: undefined,
        pdfVersion: undefined,
        metadata: {},
      };
    }

    console.error(`[pdf-unlocker] pdfinfo could not read ${filePath}: ${result.stderr.trim()}`);
    throw new InvalidPdfError(firstLine(result.stderr) ?? `pdfinfo exited with code ${result.exitCode}`);
  }

  async function decrypt(inputPath: string, outputPath: string, password: string): Promise<void> {
    // The password goes through stdin so it never shows up in the process list.
    const result = await runner(
      config.qpdf,
      ["--password-file=-", "--decrypt", inputPath, outputPath],
      { timeoutSeconds, input: `${password}\n` },
    );

    if (succeeded(result, true)) {
      if (result.exitCode === QPDF_EXIT_WARNINGS) {
        console.warn(`[pdf-unlocker] qpdf decrypt warnings: ${result.stderr.trim()}`);
      }
      return;
    }
    if (!result.timedOut && result.stderr.toLowerCase().includes("invalid password")) {
      throw new InvalidPasswordError();
    }
    throw new PdfToolError(config.qpdf, result.exitCode, result.stderr);
  }

  async function encrypt(inputPath: string, outputPath: string, options: EncryptOptions): Promise<void> {
    // The "=" forms keep a password that starts with "-" from being read as an option.
    const encryptArgs = [
      "--encrypt",
      `--user-password=${options.userPassword}`,
      `--owner-password=${options.ownerPassword}`,
      `--bits=${options.keyBits}`,
    ];
    if (options.keyBits === 128) {
      encryptArgs.push("--use-aes=y");
    }
    encryptArgs.push("--");

    // "@-" makes qpdf read these arguments from stdin, one per line.
    const result = await runner(
      config.qpdf,
      ["@-", inputPath, outputPath],
      { timeoutSeconds, input: `${encryptArgs.join("\n")}\n` },
    );

    if (succeeded(result, true)) {
      if (result.exitCode === QPDF_EXIT_WARNINGS) {
        console.warn(`[pdf-unlocker] qpdf encrypt warnings: ${result.stderr.trim()}`);
      }
      return;
    }
    throw new PdfToolError(config.qpdf, result.exitCode, result.stderr);
  }

  async function probeTool(name: string, command: string, args: string[]): Promise<ToolStatus> {
    try {
      const result = await runner(command, args, { timeoutSeconds });
      return {
        name,
        available: result.exitCode === 0,
        version: firstLine(result.stdout) ?? firstLine(result.stderr),
      };
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        return { name, available: false };
      }
      throw error;
    }
  }

  async function probe(): Promise<ToolStatus[]> {
    return Promise.all([
      probeTool("pdfinfo", config.pdfinfo, ["-v"]),
      probeTool("qpdf", config.qpdf, ["--version"]),
    ]);
  }

  return { inspect, decrypt, encrypt, probe };
}
