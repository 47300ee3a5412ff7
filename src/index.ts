#!/usr/bin/env node
import { createCoreConfig, loadDotEnv, resolveRepoRoot } from "./core/config.js";
import { createMonitorContext } from "./core/context.js";
import { loadRedactionFields } from "./core/policy.js";
import { logError, logInfo } from "./core/utils.js";
import { ToolRegistry } from "./mcp/registry.js";
import { createMcpApp, startStdioServer } from "./mcp/server.js";
import { buildMonitorTools } from "./tools/index.js";

async function main(): Promise<void> {
  const repoRoot = resolveRepoRoot();
  loadDotEnv(repoRoot);

  const config = createCoreConfig(repoRoot);
  const context = createMonitorContext(config);
  const registry = new ToolRegistry(buildMonitorTools({ client: context.client, now: Date.now }), loadRedactionFields(repoRoot));

  const startup = {
    deployment: config.deployment,
    region: config.region,
    baseUrl: context.session.getBaseUrl(),
    tools: registry.size,
  };

  if (config.transport === "http") {
    const app = createMcpApp(registry, config);
    const listener = app.listen(config.port, config.host, () => {
      logInfo("server.started", {
        ...startup,
        transport: "http",
        url: `http://${config.host}:${config.port}${config.mcpPath}`,
      });
    });
    listener.on("error", (error) => {
      logError("server.listenFailed", { error: error.message });
      process.exitCode = 1;
    });
    return;
  }

  await startStdioServer(registry);
  logInfo("server.started", { ...startup, transport: "stdio" });
}

main().catch((error: unknown) => {
  logError("server.failed", { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
