import fs from "fs";
import TOML from "@iarna/toml";

const DEFAULT_CONFIG_PATH = "config.toml";

export interface ToolsConfig {
  pdfinfo: string;
  qpdf: string;
  timeoutSeconds: number;
}

export type KeyBits = 128 | 256;

export interface EncryptionConfig {
  keyBits: KeyBits;
}

export interface JobsConfig {
  maxConcurrent: number;
  maxQueued: number;
}

export interface CleanupConfig {
  staleAfterSeconds: number;
  sweepIntervalSeconds: number;
}

export interface Config {
  host: string;
  port: number;
  tempDir: string;
  allowedOrigins: string[];
  maxUploadBytes: number;
  minPasswordLength: number;
  tools: ToolsConfig;
  encryption: EncryptionConfig;
  jobs: JobsConfig;
  cleanup: CleanupConfig;
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function readTable(table: Table, key: string): Table {
  const value = table[key];
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new Error(`Config [${key}] must be a table.`);
  }
  return value;
}

function readString(table: Table, key: string, label: string, fallback: string): string {
  const value = table[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`Config ${label} must be a non-empty string.`);
  }
  return value;
}

function readInteger(table: Table, key: string, label: string, fallback: number, min: number, max: number): number {
  const value = table[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Config ${label} must be an integer between ${min} and ${max}.`);
  }
  return value;
}

function readStringArray(table: Table, key: string, label: string, fallback: string[]): string[] {
  const value = table[key];
  if (value === undefined) {
    return fallback;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new Error(`Config ${label} must be an array of strings.`);
  }
  return value;
}

function readKeyBits(table: Table): KeyBits {
  const value = table.keyBits;
  if (value === undefined || value === 128) {
    return 128;
  }
  if (value === 256) {
    return 256;
  }
  throw new Error("Config encryption.keyBits must be 128 or 256.");
}

function parsePortOverride(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got "${raw}".`);
  }
  return port;
}

function readConfigFile(): Table {
  const explicitPath = process.env.CONFIG_PATH;
  const configPath = explicitPath || DEFAULT_CONFIG_PATH;

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    console.log(`[pdf-unlocker] No ${DEFAULT_CONFIG_PATH} found, using defaults.`);
    return {};
  }

  console.log(`[pdf-unlocker] Loading config from ${configPath}`);
  return TOML.parse(fs.readFileSync(configPath, "utf-8"));
}

export function loadConfig(): Config {
  const raw = readConfigFile();
  const tools = readTable(raw, "tools");
  const encryption = readTable(raw, "encryption");
  const jobs = readTable(raw, "jobs");
  const cleanup = readTable(raw, "cleanup");

  const config: Config = {
    host: readString(raw, "host", "host", "0.0.0.0"),
    port: readInteger(raw, "port", "port", 8000, 1, 65535),
    tempDir: readString(raw, "tempDir", "tempDir", "temp_files"),
    allowedOrigins: readStringArray(raw, "allowedOrigins", "allowedOrigins", [
      "http://localhost:5173",
      "http://localhost:3000",
      "*",
    ]),
    maxUploadBytes: readInteger(raw, "maxUploadBytes", "maxUploadBytes", 50 * 1024 * 1024, 1, Number.MAX_SAFE_INTEGER),
    minPasswordLength: readInteger(raw, "minPasswordLength", "minPasswordLength", 4, 1, 1024),
    tools: {
      pdfinfo: readString(tools, "pdfinfo", "tools.pdfinfo", "pdfinfo"),
      qpdf: readString(tools, "qpdf", "tools.qpdf", "qpdf"),
      timeoutSeconds: readInteger(tools, "timeoutSeconds", "tools.timeoutSeconds", 60, 1, 3600),
    },
    encryption: {
      keyBits: readKeyBits(encryption),
    },
    jobs: {
      maxConcurrent: readInteger(jobs, "maxConcurrent", "jobs.maxConcurrent", 2, 1, 64),
      maxQueued: readInteger(jobs, "maxQueued", "jobs.maxQueued", 20, 0, 10000),
    },
    cleanup: {
      staleAfterSeconds: readInteger(cleanup, "staleAfterSeconds", "cleanup.staleAfterSeconds", 3600, 1, 604800),
      sweepIntervalSeconds: readInteger(cleanup, "sweepIntervalSeconds", "cleanup.sweepIntervalSeconds", 600, 1, 86400),
    },
  };

  if (config.allowedOrigins.length === 0) {
    throw new Error("Config allowedOrigins must list at least one origin.");
  }

  // Orchestrators hand the port and scratch location in through the environment.
  if (process.env.HOST) {
    config.host = process.env.HOST;
  }
  if (process.env.PORT) {
    config.port = parsePortOverride(process.env.PORT);
  }
  if (process.env.TEMP_DIR) {
    config.tempDir = process.env.TEMP_DIR;
  }

  return config;
}
