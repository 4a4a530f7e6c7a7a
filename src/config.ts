import { readFileSync } from "node:fs";
import type { Collaboration } from "./contracts.js";

export type StoreKind = "memory" | "redis";

export interface TaskHubConfig {
  host: string;
  port: number;
  store: StoreKind;
  redisUrl: string;
  logLevel: string;
  notifyTimeoutMs: number;
  collaborationsFile?: string;
}

function nonNegativeInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TaskHubConfig {
  const store = env.TASKHUB_STORE ?? "memory";
  if (store !== "memory" && store !== "redis") {
    throw new Error(`TASKHUB_STORE must be "memory" or "redis", got "${store}"`);
  }

  return {
    host: env.TASKHUB_HOST ?? "0.0.0.0",
    port: nonNegativeInt(env.TASKHUB_PORT, 8787, "TASKHUB_PORT"),
    store,
    redisUrl: env.TASKHUB_REDIS_URL ?? "redis://localhost:6379",
    logLevel: env.TASKHUB_LOG_LEVEL ?? "info",
    notifyTimeoutMs: nonNegativeInt(env.TASKHUB_NOTIFY_TIMEOUT_MS, 2_000, "TASKHUB_NOTIFY_TIMEOUT_MS"),
    collaborationsFile: env.TASKHUB_COLLABORATIONS_FILE || undefined,
  };
}

function isNode(value: unknown): value is { id: number; name: string } {
  if (typeof value !== "object" || value === null) return false;
  return (
    "id" in value &&
    Number.isInteger(value.id) &&
    "name" in value &&
    typeof value.name === "string"
  );
}

export function isCollaboration(value: unknown): value is Collaboration {
  if (!isNode(value)) return false;
  return "nodes" in value && Array.isArray(value.nodes) && value.nodes.every(isNode);
}

/** Reads a JSON array of collaborations used to seed the in-memory directory. */
export function loadCollaborations(file: string): Collaboration[] {
  const parsed: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!Array.isArray(parsed)) throw new Error(`${file}: expected a JSON array of collaborations`);

  return parsed.map((entry, i) => {
    if (!isCollaboration(entry)) throw new Error(`${file}: entry ${i} is not a collaboration`);
    return entry;
  });
}
