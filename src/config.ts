import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Resolve ../.env relative to this module first (project root), then fall back to cwd.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  DATA_DIR: string;
  INDEX_PATH: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  MAX_FEATURES: number;
  MAX_QUERY_LENGTH: number;
  MAX_RESULTS_PER_PAGE: number;
  DEFAULT_RESULTS_PER_PAGE: number;
  OPENAI_API_KEY: string | undefined;
  OPENAI_MODEL: string;
  OPENAI_TIMEOUT_MS: number;
  LOCAL_LLM_BASE_URL: string;
  LOCAL_LLM_MODEL: string;
  GPT4ALL_BASE_URL: string;
  GPT4ALL_MODEL: string;
  BUILD_ON_START: boolean;
  VERBOSE: boolean;
  FOLDER_INFO_NAME: string;
  MCP_TRANSPORT: string;
}

/** Tolerant truthy parsing ("1", "true", "yes", "on"). */
function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Positive integer with a fallback and an upper clamp. */
function parseCount(raw: string | undefined, fallback: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && n >= 1 ? Math.min(max, Math.floor(n)) : fallback;
}

function parseList(raw: string | undefined): string[] | undefined {
  return raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const DATA_DIR = path.resolve(env.RAG_DATA_DIR?.trim() || path.join(process.cwd(), "data"));
  const INDEX_PATH = path.resolve(env.RAG_INDEX_PATH?.trim() || path.join(DATA_DIR, "index.json"));

  // Normalized once; leading dots stripped so "pdf" and ".pdf" are equivalent.
  const ALLOWED_EXT = parseList(env.ALLOWED_EXT)?.map((e) => e.replace(/^\./, "").toLowerCase()) ?? [
    "txt",
    "md",
    "csv",
    "json",
    "xml",
    "log",
    "py",
    "java",
    "js",
    "ts",
    "html",
    "css",
    "yaml",
    "yml",
    "ini",
    "cfg",
    "conf",
    "err",
    "out",
    "sql",
    "sh",
    "bat",
    "ps1",
    "c",
    "cpp",
    "h",
    "pdf",
    "docx",
  ];

  // Folder names (not globs) pruned during discovery.
  const EXCLUDED_FOLDERS = parseList(env.EXCLUDED_FOLDERS) ?? [
    "node_modules",
    ".git",
    "dist",
    "build",
    ".cache",
    "coverage",
  ];

  const MAX_RESULTS_PER_PAGE = parseCount(env.RAG_MAX_RESULTS_PER_PAGE, 100, 1000);
  const DEFAULT_RESULTS_PER_PAGE = Math.min(
    MAX_RESULTS_PER_PAGE,
    parseCount(env.RAG_DEFAULT_RESULTS_PER_PAGE, 10, 1000),
  );

  return {
    DATA_DIR,
    INDEX_PATH,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    MAX_FEATURES: parseCount(env.RAG_MAX_FEATURES, 5000, 1_000_000),
    MAX_QUERY_LENGTH: parseCount(env.RAG_MAX_QUERY_LENGTH, 500, 100_000),
    MAX_RESULTS_PER_PAGE,
    DEFAULT_RESULTS_PER_PAGE,
    OPENAI_API_KEY: env.OPENAI_API_KEY?.trim() || undefined,
    OPENAI_MODEL: env.OPENAI_MODEL?.trim() || "gpt-3.5-turbo",
    OPENAI_TIMEOUT_MS: parseCount(env.RAG_OPENAI_TIMEOUT, 30, 3600) * 1000,
    LOCAL_LLM_BASE_URL: env.LOCAL_LLM_BASE_URL?.trim() || "http://127.0.0.1:8080/v1",
    LOCAL_LLM_MODEL: env.LOCAL_LLM_MODEL?.trim() || "local-model",
    GPT4ALL_BASE_URL: env.GPT4ALL_BASE_URL?.trim() || "http://127.0.0.1:4891/v1",
    GPT4ALL_MODEL: env.GPT4ALL_MODEL?.trim() || "Llama 3 8B Instruct",
    BUILD_ON_START: parseFlag(env.BUILD_ON_START),
    VERBOSE: parseFlag(env.VERBOSE),
    // Human-friendly label used purely in tool descriptions.
    FOLDER_INFO_NAME: env.FOLDER_INFO_NAME?.trim() || "RAG_DATA_DIR",
    // 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
  };
}
