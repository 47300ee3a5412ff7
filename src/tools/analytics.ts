import * as z from "zod/v4";

import { RegisteredTool, defineTool } from "../mcp/registry.js";
import { ToolContext, resolveId } from "./shared.js";

const entityName = z.string().trim().min(1);

const queryRawInput = z.strictObject({
  entity: entityName.describe("Entity name (e.g., Machines, Sessions, Connections)"),
  filter: z.string().optional().describe("OData $filter expression"),
  select: z.array(z.string()).optional().describe("Fields to select"),
  orderby: z.string().optional().describe("OData $orderby expression"),
  top: z.number().int().positive().optional().describe("Maximum records to return"),
  skip: z.number().int().nonnegative().optional().describe("Number of records to skip"),
  expand: z.array(z.string()).optional().describe("Related entities to expand"),
  count: z.boolean().optional().describe("Ask the server to include a total count"),
});

const noInput = z.strictObject({});

const loadIndexInput = z.strictObject({
  machine_id: z.number().int().optional().describe("Machine ID"),
  machine_name: z.string().optional().describe("Machine name (alternative to machine_id)"),
});

const entityCountInput = z.strictObject({
  entity: entityName.describe("Entity name (e.g., Machines, Sessions)"),
  filter: z.string().optional().describe("OData $filter expression"),
});

const aggregateInput = z.strictObject({
  entity: entityName.describe("Entity name"),
  apply: z.string().trim().min(1).describe("OData $apply expression (e.g., 'aggregate(SessionCount with sum as Total)')"),
});

export function analyticsTools({ client }: ToolContext): RegisteredTool[] {
  return [
    defineTool({
      name: "citrix_query_raw",
      description: "Execute a custom OData query against any entity",
      inputSchema: queryRawInput,
      handler: async (args) => client.query(args),
    }),
    defineTool({
      name: "citrix_delivery_groups",
      description: "List all delivery groups",
      inputSchema: noInput,
      handler: async () => client.query({ entity: "DesktopGroups" }),
    }),
    defineTool({
      name: "citrix_hypervisors",
      description: "List all hypervisors/hosts",
      inputSchema: noInput,
      handler: async () => client.query({ entity: "Hypervisors" }),
    }),
    defineTool({
      name: "citrix_load_index",
      description: "Get load index data for machines",
      inputSchema: loadIndexInput,
      handler: async (args) => {
        const machineId = await resolveId(client, "Machines", "Name", args.machine_id, args.machine_name);
        return client.query({
          entity: "LoadIndexes",
          filter: machineId !== undefined ? `MachineId eq ${machineId}` : undefined,
          orderby: "CreatedDate desc",
        });
      },
    }),
    defineTool({
      name: "citrix_entity_count",
      description: "Get count of entities matching a filter",
      inputSchema: entityCountInput,
      handler: async (args) => ({
        entity: args.entity,
        count: await client.count(args.entity, args.filter || undefined),
      }),
    }),
    defineTool({
      name: "citrix_aggregate",
      description: "Execute an OData aggregation query",
      inputSchema: aggregateInput,
      handler: async (args) => client.aggregate(args.entity, args.apply),
    }),
  ];
}
