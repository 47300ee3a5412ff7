import * as z from "zod/v4";

import { FilterBuilder, daysAgoIso } from "../core/filter.js";
import { RegisteredTool, defineTool } from "../mcp/registry.js";
import { ToolContext, customFilter, lookbackDays } from "./shared.js";

const deliveryGroup = z.string().optional().describe("Filter by delivery group name");

const connectionListInput = z.strictObject({
  session_key: z.string().optional().describe("Filter by session key"),
  filter: customFilter,
});

const connectionFailuresInput = z.strictObject({
  delivery_group: deliveryGroup,
  days: lookbackDays,
  filter: customFilter,
});

const failureSummaryInput = z.strictObject({
  delivery_group: deliveryGroup,
  days: lookbackDays,
});

export function connectionTools({ client, now }: ToolContext): RegisteredTool[] {
  return [
    defineTool({
      name: "citrix_connection_list",
      description: "List connections (initial connects and reconnects)",
      inputSchema: connectionListInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.filter)
          .add(args.session_key && `SessionKey eq '${args.session_key}'`)
          .build();
        return client.query({ entity: "Connections", filter, orderby: "LogOnStartDate desc" });
      },
    }),
    defineTool({
      name: "citrix_connection_failures",
      description: "Get connection failure logs",
      inputSchema: connectionFailuresInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.filter)
          .add(args.delivery_group && `DesktopGroup/Name eq '${args.delivery_group}'`)
          .add(`FailureDate ge ${daysAgoIso(args.days, now())}`)
          .build();
        return client.query({
          entity: "ConnectionFailureLogs",
          filter,
          expand: ["DesktopGroup"],
          orderby: "FailureDate desc",
        });
      },
    }),
    defineTool({
      name: "citrix_failure_summary",
      description: "Get failure summary counts by time period",
      inputSchema: failureSummaryInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.delivery_group && `DesktopGroup/Name eq '${args.delivery_group}'`)
          .add(`SummaryDate ge ${daysAgoIso(args.days, now())}`)
          .build();
        return client.query({
          entity: "FailureLogSummaries",
          filter,
          expand: ["DesktopGroup"],
          orderby: "SummaryDate desc",
        });
      },
    }),
  ];
}
