import dotenv from "dotenv";
import fsSync from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import { CONTENT_TYPES, isContentType, type ContentType } from "./types";

// Single dotenv.config() call. Prefer the project-root .env next to package.json,
// falling back to the working directory.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type EmbeddingBackendKind = "transformers" | "hash";

export interface Config {
  /** Content library root the builder walks; required for builds only. */
  CONTENT_ROOT: string | undefined;
  /** Full checkout used for full-text hydration; unset means metadata-only results. */
  CONTENT_PATH: string | undefined;
  INDEX_DIR: string;
  EMBEDDING_BACKEND: EmbeddingBackendKind;
  MODEL_NAME: string;
  TRANSFORMERS_CACHE: string | undefined;
  EMBED_MAX_CHARS: number;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  EMBED_TIMEOUT_MS: number;
  EMBED_RETRIES: number;
  INDEX_CONCURRENCY: number;
  /** Types a build walks by default (all of them unless INDEX_TYPES narrows it). */
  INDEX_TYPES: ContentType[];
  FOLLOW_SYMLINKS: boolean;
  INCLUDE_DEPRECATED: boolean;
  /** Files walked per type; 0 means no cap. */
  MAX_ITEMS: number;
  INDEX_ON_START: boolean;
  VERBOSE: boolean;
  MCP_TRANSPORT: "stdio" | "http";
  MCP_PORT: number;
  HOST: string;
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

function flag(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Tolerant integer parse clamped into [min, max]; garbage falls back to the default. */
function int(raw: string | undefined, fallback: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function list(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Expand a leading `~` and make the path absolute. */
export function expandPath(p: string): string {
  const withHome = p === "~" || p.startsWith("~/") ? path.join(os.homedir(), p.slice(1)) : p;
  return path.resolve(withHome);
}

/**
 * Normalize the environment into a typed {@link Config}. Values are clamped,
 * never rejected; unknown content types in INDEX_TYPES are dropped with a log line.
 */
export function readConfig(env: Env = process.env): Config {
  const contentRoot = env.CONTENT_ROOT?.trim();
  const contentPath = env.PATTERN_CONTENT_PATH?.trim();

  const backendRaw = (env.EMBEDDING_BACKEND ?? "").trim().toLowerCase();
  const EMBEDDING_BACKEND: EmbeddingBackendKind = backendRaw === "hash" ? "hash" : "transformers";
  if (backendRaw && backendRaw !== "hash" && backendRaw !== "transformers") {
    console.error(`[MCP] Unknown EMBEDDING_BACKEND "${backendRaw}", using transformers`);
  }

  const requestedTypes = list(env.INDEX_TYPES);
  const INDEX_TYPES = requestedTypes.filter(isContentType);
  for (const t of requestedTypes) {
    if (!isContentType(t)) console.error(`[MCP] Ignoring unknown content type in INDEX_TYPES: ${t}`);
  }

  const transportRaw = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  const allowedHosts = list(env.ALLOWED_HOSTS);

  return {
    CONTENT_ROOT: contentRoot ? expandPath(contentRoot) : undefined,
    CONTENT_PATH: contentPath ? expandPath(contentPath) : undefined,
    INDEX_DIR: expandPath(env.PATTERN_INDEX_DIR?.trim() || "~/.pattern-index"),
    EMBEDDING_BACKEND,
    MODEL_NAME: env.MODEL_NAME?.trim() || "Xenova/all-MiniLM-L6-v2",
    TRANSFORMERS_CACHE: env.TRANSFORMERS_CACHE?.trim() || undefined,
    EMBED_MAX_CHARS: int(env.EMBED_MAX_CHARS, 1000, 32, 100_000),
    CHUNK_SIZE: int(env.CHUNK_SIZE, 800, 1, 8000),
    CHUNK_OVERLAP: int(env.CHUNK_OVERLAP, 120, 0, 4000),
    EMBED_TIMEOUT_MS: int(env.EMBED_TIMEOUT_MS, 30_000, 100, 600_000),
    EMBED_RETRIES: int(env.EMBED_RETRIES, 0, 0, 10),
    INDEX_CONCURRENCY: int(env.INDEX_CONCURRENCY, 4, 1, 64),
    INDEX_TYPES: INDEX_TYPES.length ? INDEX_TYPES : [...CONTENT_TYPES],
    FOLLOW_SYMLINKS: flag(env.FOLLOW_SYMLINKS, false),
    INCLUDE_DEPRECATED: flag(env.INCLUDE_DEPRECATED, false),
    MAX_ITEMS: int(env.MAX_ITEMS, 0, 0, 1_000_000),
    INDEX_ON_START: flag(env.INDEX_ON_START, false),
    VERBOSE: flag(env.VERBOSE, false),
    MCP_TRANSPORT: transportRaw === "http" || transportRaw === "streamable-http" ? "http" : "stdio",
    MCP_PORT: int(env.MCP_PORT, 3000, 1, 65_535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: allowedHosts.length ? allowedHosts : undefined,
    ENABLE_DNS_REBINDING_PROTECTION: flag(env.ENABLE_DNS_REBINDING_PROTECTION, true),
  };
}
