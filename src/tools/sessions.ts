import * as z from "zod/v4";

import { FilterBuilder } from "../core/filter.js";
import { RegisteredTool, defineTool } from "../mcp/registry.js";
import { ToolContext, customFilter } from "./shared.js";

const ACTIVE_SESSION = "EndDate eq null";

const sessionKey = z.string().min(1).describe("Session key (GUID)");

const sessionListInput = z.strictObject({
  active_only: z.boolean().default(false).describe("Only show active sessions (no end date)"),
  user_name: z.string().optional().describe("Filter by username"),
  machine_name: z.string().optional().describe("Filter by machine name"),
  filter: customFilter,
});

const sessionKeyInput = z.strictObject({ session_key: sessionKey });

const sessionCountInput = z.strictObject({
  active_only: z.boolean().default(false).describe("Only count active sessions"),
  filter: customFilter,
});

export function sessionTools({ client }: ToolContext): RegisteredTool[] {
  return [
    defineTool({
      name: "citrix_session_list",
      description: "List sessions with optional filters",
      inputSchema: sessionListInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.filter)
          .add(args.active_only && ACTIVE_SESSION)
          .add(args.user_name && `User/UserName eq '${args.user_name}'`)
          .add(args.machine_name && `Machine/Name eq '${args.machine_name}'`)
          .build();
        return client.query({
          entity: "Sessions",
          filter,
          expand: ["User", "Machine"],
          orderby: "StartDate desc",
        });
      },
    }),
    defineTool({
      name: "citrix_session_details",
      description: "Get detailed information for a specific session",
      inputSchema: sessionKeyInput,
      handler: async (args) => client.querySingle("Sessions", `'${args.session_key}'`, ["User", "Machine"]),
    }),
    defineTool({
      name: "citrix_session_logon_metrics",
      description: "Get logon duration breakdown for a session (GPO, profile, scripts, etc.)",
      inputSchema: sessionKeyInput,
      handler: async (args) =>
        client.query({
          entity: "LogOnMetrics",
          filter: `SessionKey eq '${args.session_key}'`,
        }),
    }),
    defineTool({
      name: "citrix_session_count",
      description: "Get count of sessions matching criteria",
      inputSchema: sessionCountInput,
      handler: async (args) => {
        let filter = args.filter || undefined;
        if (args.active_only) {
          filter = filter ? `(${filter}) and ${ACTIVE_SESSION}` : ACTIVE_SESSION;
        }
        return { count: await client.count("Sessions", filter) };
      },
    }),
  ];
}
