import * as z from "zod/v4";

import { FilterBuilder, daysAgoIso } from "../core/filter.js";
import { RegisteredTool, defineTool } from "../mcp/registry.js";
import { ToolContext, customFilter, lookbackDays } from "./shared.js";

const appListInput = z.strictObject({ filter: customFilter });

const appInstancesInput = z.strictObject({
  app_id: z.number().int().optional().describe("Application ID"),
  app_name: z.string().optional().describe("Application name (alternative to app_id)"),
  active_only: z.boolean().default(false).describe("Only show active instances"),
});

const appErrorsInput = z.strictObject({
  app_name: z.string().optional().describe("Filter by application name"),
  days: lookbackDays,
});

export function applicationTools({ client, now }: ToolContext): RegisteredTool[] {
  return [
    defineTool({
      name: "citrix_app_list",
      description: "List published applications",
      inputSchema: appListInput,
      handler: async (args) => client.query({ entity: "Applications", filter: args.filter || undefined }),
    }),
    defineTool({
      name: "citrix_app_instances",
      description: "List running application instances",
      inputSchema: appInstancesInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.app_id ? `ApplicationId eq ${args.app_id}` : undefined)
          .add(args.app_name && `Application/Name eq '${args.app_name}'`)
          .add(args.active_only && "EndDate eq null")
          .build();
        return client.query({
          entity: "ApplicationInstances",
          filter,
          expand: ["Application"],
          orderby: "StartDate desc",
        });
      },
    }),
    defineTool({
      name: "citrix_app_errors",
      description: "Get application errors and faults",
      inputSchema: appErrorsInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.app_name && `Application/Name eq '${args.app_name}'`)
          .add(`CreatedDate ge ${daysAgoIso(args.days, now())}`)
          .build();
        return client.query({
          entity: "ApplicationFaults",
          filter,
          expand: ["Application"],
          orderby: "CreatedDate desc",
        });
      },
    }),
  ];
}
