import crypto from "node:crypto";

import { JsonObject } from "./types.js";

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function readStringEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

export function readBoolEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function readIntEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return defaultValue;
  return clamp(Math.trunc(parsed), min, max);
}

export function isPlainObject(v: unknown): v is JsonObject {
  if (v === null || typeof v !== "object") return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function constantTimeEqual(lhs: string, rhs: string): boolean {
  const left = Buffer.from(lhs);
  const right = Buffer.from(rhs);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// stdout belongs to the stdio transport, so every log line goes to stderr.
function writeLog(level: "info" | "warn" | "error", event: string, data: JsonObject): void {
  process.stderr.write(
    `${JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    })}\n`,
  );
}

export function logInfo(event: string, data: JsonObject = {}): void {
  writeLog("info", event, data);
}

export function logWarn(event: string, data: JsonObject = {}): void {
  writeLog("warn", event, data);
}

export function logError(event: string, data: JsonObject = {}): void {
  writeLog("error", event, data);
}
