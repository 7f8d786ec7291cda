import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { expandPath, readConfig } from "./config";
import { CONTENT_TYPES } from "./types";

describe("readConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = readConfig({});
    expect(config).toMatchObject({
      CONTENT_ROOT: undefined,
      CONTENT_PATH: undefined,
      INDEX_DIR: path.join(os.homedir(), ".pattern-index"),
      EMBEDDING_BACKEND: "transformers",
      MODEL_NAME: "Xenova/all-MiniLM-L6-v2",
      EMBED_MAX_CHARS: 1000,
      CHUNK_SIZE: 800,
      CHUNK_OVERLAP: 120,
      EMBED_TIMEOUT_MS: 30000,
      EMBED_RETRIES: 0,
      INDEX_CONCURRENCY: 4,
      FOLLOW_SYMLINKS: false,
      INCLUDE_DEPRECATED: false,
      MAX_ITEMS: 0,
      INDEX_ON_START: false,
      MCP_TRANSPORT: "stdio",
      MCP_PORT: 3000,
      HOST: "127.0.0.1",
      ALLOWED_HOSTS: undefined,
      ENABLE_DNS_REBINDING_PROTECTION: true,
    });
    expect(config.INDEX_TYPES).toEqual([...CONTENT_TYPES]);
  });

  it("clamps numbers and ignores garbage", () => {
    const config = readConfig({
      INDEX_CONCURRENCY: "500",
      CHUNK_SIZE: "0",
      EMBED_TIMEOUT_MS: "soon",
      EMBED_RETRIES: "2.9",
      MAX_ITEMS: "-3",
    });
    expect(config.INDEX_CONCURRENCY).toBe(64);
    expect(config.CHUNK_SIZE).toBe(1);
    expect(config.EMBED_TIMEOUT_MS).toBe(30000);
    expect(config.EMBED_RETRIES).toBe(2);
    expect(config.MAX_ITEMS).toBe(0);
  });

  it("reads flags, lists and transport names", () => {
    const config = readConfig({
      EMBEDDING_BACKEND: "HASH",
      FOLLOW_SYMLINKS: "yes",
      VERBOSE: "1",
      ENABLE_DNS_REBINDING_PROTECTION: "off",
      MCP_TRANSPORT: "streamable-http",
      ALLOWED_HOSTS: "localhost, 127.0.0.1,",
      INDEX_TYPES: "playbook, widget,mapper",
      PATTERN_INDEX_DIR: "/var/lib/patterns",
      CONTENT_ROOT: "~/content",
    });
    expect(config.EMBEDDING_BACKEND).toBe("hash");
    expect(config.FOLLOW_SYMLINKS).toBe(true);
    expect(config.VERBOSE).toBe(true);
    expect(config.ENABLE_DNS_REBINDING_PROTECTION).toBe(false);
    expect(config.MCP_TRANSPORT).toBe("http");
    expect(config.ALLOWED_HOSTS).toEqual(["localhost", "127.0.0.1"]);
    expect(config.INDEX_TYPES).toEqual(["playbook", "mapper"]);
    expect(config.INDEX_DIR).toBe("/var/lib/patterns");
    expect(config.CONTENT_ROOT).toBe(path.join(os.homedir(), "content"));
  });

  it("falls back to transformers for an unknown backend", () => {
    expect(readConfig({ EMBEDDING_BACKEND: "quantum" }).EMBEDDING_BACKEND).toBe("transformers");
  });
});

describe("expandPath", () => {
  it("expands the home directory and resolves relative paths", () => {
    expect(expandPath("~")).toBe(os.homedir());
    expect(expandPath("rel/dir")).toBe(path.resolve("rel/dir"));
  });
});
