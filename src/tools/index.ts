import { RegisteredTool } from "../mcp/registry.js";
import { analyticsTools } from "./analytics.js";
import { applicationTools } from "./applications.js";
import { connectionTools } from "./connections.js";
import { machineTools } from "./machines.js";
import { sessionTools } from "./sessions.js";
import { ToolContext } from "./shared.js";
import { userTools } from "./users.js";

export type { ToolContext } from "./shared.js";

export function buildMonitorTools(context: ToolContext): RegisteredTool[] {
  return [
    ...machineTools(context),
    ...sessionTools(context),
    ...connectionTools(context),
    ...applicationTools(context),
    ...userTools(context),
    ...analyticsTools(context),
  ];
}
