import test from "node:test";
import type { TestContext } from "node:test";
import assert from "node:assert/strict";

import { createCoreConfig, parseDeploymentMode, resolveCloudEndpoint } from "./config.js";
import { ConfigurationError } from "./errors.js";

const CONFIG_ENV_VARS = [
  "CITRIX_DEPLOYMENT",
  "CITRIX_REGION",
  "CITRIX_VERIFY_SSL",
  "CITRIX_CUSTOMER_ID",
  "CITRIX_CLIENT_ID",
  "CITRIX_CLIENT_SECRET",
  "CITRIX_API_ENDPOINT",
  "CITRIX_DDC_HOST",
  "CITRIX_DOMAIN",
  "CITRIX_USERNAME",
  "CITRIX_PASSWORD",
  "HTTP_TIMEOUT_MS",
  "MAX_RETRIES",
  "MCP_TRANSPORT",
  "HOST",
  "PORT",
  "MCP_PATH",
  "HEALTH_PATH",
  "SERVER_API_KEY",
];

function useEnv(t: TestContext, values: Record<string, string>): void {
  const saved = new Map<string, string | undefined>();
  for (const name of CONFIG_ENV_VARS) {
    saved.set(name, process.env[name]);
    delete process.env[name];
  }
  Object.assign(process.env, values);
  t.after(() => {
    for (const [name, value] of saved) {
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
  });
}

test("createCoreConfig applies defaults with an empty environment", (t) => {
  useEnv(t, {});
  const config = createCoreConfig("/repo");

  assert.equal(config.deployment, "cloud");
  assert.equal(config.region, "us");
  assert.equal(config.verifySsl, true);
  assert.equal(config.domain, "");
  assert.equal(config.customerId, undefined);
  assert.equal(config.httpTimeoutMs, 30_000);
  assert.equal(config.maxRetries, 3);
  assert.equal(config.transport, "stdio");
  assert.equal(config.host, "127.0.0.1");
  assert.equal(config.port, 8787);
  assert.equal(config.mcpPath, "/mcp");
  assert.equal(config.healthPath, "/healthz");
  assert.equal(config.serverApiKey, "");
});

test("createCoreConfig reads on-prem settings and clamps numeric values", (t) => {
  useEnv(t, {
    CITRIX_DEPLOYMENT: "On-Prem",
    CITRIX_DDC_HOST: "https://ddc.example.test",
    CITRIX_DOMAIN: "CORP",
    CITRIX_USERNAME: "monitor",
    CITRIX_PASSWORD: "test-password",
    CITRIX_VERIFY_SSL: "false",
    MAX_RETRIES: "50",
    HTTP_TIMEOUT_MS: "10",
  });
  const config = createCoreConfig("/repo");

  assert.equal(config.deployment, "onprem");
  assert.equal(config.ddcHost, "https://ddc.example.test");
  assert.equal(config.domain, "CORP");
  assert.equal(config.username, "monitor");
  assert.equal(config.verifySsl, false);
  assert.equal(config.maxRetries, 12);
  assert.equal(config.httpTimeoutMs, 1_000);
});

test("createCoreConfig lets explicit overrides win over the environment", (t) => {
  useEnv(t, { CITRIX_REGION: "eu" });
  const config = createCoreConfig("/repo", { region: "jp", maxRetries: 1 });

  assert.equal(config.region, "jp");
  assert.equal(config.maxRetries, 1);
});

test("createCoreConfig rejects an unknown transport", (t) => {
  useEnv(t, { MCP_TRANSPORT: "websocket" });

  assert.throws(() => createCoreConfig("/repo"), ConfigurationError);
});

test("parseDeploymentMode accepts aliases and rejects unknown modes", () => {
  assert.equal(parseDeploymentMode(undefined), "cloud");
  assert.equal(parseDeploymentMode(" CLOUD "), "cloud");
  assert.equal(parseDeploymentMode("on-premises"), "onprem");
  assert.throws(() => parseDeploymentMode("hybrid"), /Unsupported CITRIX_DEPLOYMENT 'hybrid'/);
});

test("resolveCloudEndpoint maps regions and falls back to us", (t) => {
  useEnv(t, {});

  assert.equal(resolveCloudEndpoint(createCoreConfig("/repo", { region: "eu" })), "https://api-eu.cloud.com");
  assert.equal(resolveCloudEndpoint(createCoreConfig("/repo", { region: "ap-s" })), "https://api-ap-s.cloud.com");
  assert.equal(resolveCloudEndpoint(createCoreConfig("/repo", { region: "jp" })), "https://api.citrixcloud.jp");
  assert.equal(resolveCloudEndpoint(createCoreConfig("/repo", { region: "mars" })), "https://api-us.cloud.com");
});

test("resolveCloudEndpoint prefers an explicit endpoint without trailing slashes", (t) => {
  useEnv(t, { CITRIX_API_ENDPOINT: "http://127.0.0.1:9999//" });

  assert.equal(resolveCloudEndpoint(createCoreConfig("/repo")), "http://127.0.0.1:9999");
});
