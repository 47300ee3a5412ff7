import path from "node:path";
import { fileURLToPath } from "node:url";

import dotenv from "dotenv";

import { ConfigurationError } from "./errors.js";
import { CoreConfig, DeploymentMode, McpTransportKind } from "./types.js";
import { readBoolEnv, readIntEnv, readStringEnv } from "./utils.js";

export const CLOUD_ENDPOINTS: Readonly<Record<string, string>> = {
  us: "https://api-us.cloud.com",
  eu: "https://api-eu.cloud.com",
  "ap-s": "https://api-ap-s.cloud.com",
  jp: "https://api.citrixcloud.jp",
};

export const DEFAULT_REGION = "us";

export function resolveRepoRoot(importMetaUrl: string = import.meta.url): string {
  const here = path.dirname(fileURLToPath(importMetaUrl));
  return path.resolve(here, "..", "..");
}

/**
 * Loads `.env` from the working directory first, then from the repository
 * root for installs launched from elsewhere. Values already in the
 * environment win.
 */
export function loadDotEnv(repoRoot: string): void {
  dotenv.config();
  dotenv.config({ path: path.join(repoRoot, ".env") });
}

export function parseDeploymentMode(raw: string | undefined): DeploymentMode {
  const normalized = (raw ?? "cloud").trim().toLowerCase();
  if (normalized === "cloud") return "cloud";
  if (normalized === "onprem" || normalized === "on-prem" || normalized === "on-premises") return "onprem";
  throw new ConfigurationError(`Unsupported CITRIX_DEPLOYMENT '${raw}'. Use 'cloud' or 'onprem'.`);
}

function parseTransport(raw: string | undefined): McpTransportKind {
  const normalized = (raw ?? "stdio").trim().toLowerCase();
  if (normalized === "stdio" || normalized === "http") return normalized;
  throw new ConfigurationError(`Unsupported MCP_TRANSPORT '${raw}'. Use 'stdio' or 'http'.`);
}

export function createCoreConfig(repoRoot: string, overrides: Partial<CoreConfig> = {}): CoreConfig {
  const base: CoreConfig = {
    repoRoot,
    deployment: parseDeploymentMode(readStringEnv("CITRIX_DEPLOYMENT")),
    region: (readStringEnv("CITRIX_REGION") ?? DEFAULT_REGION).toLowerCase(),
    verifySsl: readBoolEnv("CITRIX_VERIFY_SSL", true),
    customerId: readStringEnv("CITRIX_CUSTOMER_ID"),
    clientId: readStringEnv("CITRIX_CLIENT_ID"),
    clientSecret: readStringEnv("CITRIX_CLIENT_SECRET"),
    apiEndpoint: readStringEnv("CITRIX_API_ENDPOINT"),
    ddcHost: readStringEnv("CITRIX_DDC_HOST"),
    domain: readStringEnv("CITRIX_DOMAIN") ?? "",
    username: readStringEnv("CITRIX_USERNAME"),
    password: readStringEnv("CITRIX_PASSWORD"),
    httpTimeoutMs: readIntEnv("HTTP_TIMEOUT_MS", 30_000, 1_000, 180_000),
    maxRetries: readIntEnv("MAX_RETRIES", 3, 1, 12),
    transport: parseTransport(readStringEnv("MCP_TRANSPORT")),
    host: readStringEnv("HOST") ?? "127.0.0.1",
    port: readIntEnv("PORT", 8787, 0, 65535),
    mcpPath: readStringEnv("MCP_PATH") ?? "/mcp",
    healthPath: readStringEnv("HEALTH_PATH") ?? "/healthz",
    serverApiKey: readStringEnv("SERVER_API_KEY") ?? "",
  };

  return {
    ...base,
    ...overrides,
  };
}

export function resolveCloudEndpoint(config: CoreConfig): string {
  if (config.apiEndpoint) return config.apiEndpoint.replace(/\/+$/, "");
  return CLOUD_ENDPOINTS[config.region] ?? CLOUD_ENDPOINTS[DEFAULT_REGION];
}
