import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { JsonObject } from "./types.js";
import { isPlainObject } from "./utils.js";

const DEFAULT_REDACTION_FIELDS = [
  "authorization",
  "access_token",
  "client_secret",
  "clientsecret",
  "token",
  "secret",
  "password",
];

const REDACTED = "***redacted***";

function normalizeYamlList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === "string")
    .map((v) => v.trim())
    .filter((v) => !!v);
}

function readYamlOrDefault(filePath: string, defaultValue: unknown): unknown {
  if (!fs.existsSync(filePath)) return defaultValue;
  const text = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = parseYaml(text);
  return parsed ?? defaultValue;
}

/**
 * Field names whose values never reach a log line: the built-in credential
 * names plus whatever `registry/pii-redaction.yaml` lists.
 */
export function loadRedactionFields(repoRoot: string): Set<string> {
  const parsed = readYamlOrDefault(path.join(repoRoot, "registry", "pii-redaction.yaml"), []);
  const extra = normalizeYamlList(parsed).map((x) => x.toLowerCase());
  return new Set([...DEFAULT_REDACTION_FIELDS, ...extra]);
}

function scrubString(value: string): string {
  const scrubbed = value.replace(/(bearer[=\s]+)[^\s,;"']+/gi, `$1${REDACTED}`);
  return scrubbed.length > 120 ? `${scrubbed.slice(0, 117)}...` : scrubbed;
}

export function redactForLog(value: unknown, redactionFields: Set<string>): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return scrubString(value);
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((x) => redactForLog(x, redactionFields));
  if (!isPlainObject(value)) return "[non-plain-object]";

  const out: JsonObject = {};
  for (const [k, v] of Object.entries(value)) {
    const key = k.toLowerCase();
    const shouldRedact = redactionFields.has(key) || key.includes("secret") || key.includes("token") || key.includes("password");
    out[k] = shouldRedact ? REDACTED : redactForLog(v, redactionFields);
  }
  return out;
}
