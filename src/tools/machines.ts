import * as z from "zod/v4";

import { InvalidArgumentError } from "../core/errors.js";
import { FilterBuilder } from "../core/filter.js";
import { RegisteredTool, defineTool } from "../mcp/registry.js";
import { ToolContext, customFilter, findFirst, resolveId } from "./shared.js";

const machineRef = {
  machine_id: z.number().int().optional().describe("Machine ID"),
  name: z.string().optional().describe("Machine name (alternative to machine_id)"),
};

const machineListInput = z.strictObject({
  registration_state: z.enum(["Registered", "Unregistered", "Unknown"]).optional().describe("Filter by registration state"),
  power_state: z.enum(["On", "Off", "Suspended", "Unknown"]).optional().describe("Filter by power state"),
  in_maintenance: z.boolean().optional().describe("Filter by maintenance mode"),
  filter: customFilter,
});

const machineRefInput = z.strictObject(machineRef);

export function machineTools({ client }: ToolContext): RegisteredTool[] {
  return [
    defineTool({
      name: "citrix_machine_list",
      description: "List all machines (VDAs) with optional filters",
      inputSchema: machineListInput,
      handler: async (args) => {
        const filter = new FilterBuilder()
          .add(args.filter)
          .add(args.registration_state && `CurrentRegistrationState eq '${args.registration_state}'`)
          .add(args.power_state && `CurrentPowerState eq '${args.power_state}'`)
          .add(args.in_maintenance !== undefined && `IsInMaintenanceMode eq ${args.in_maintenance}`)
          .build();
        return client.query({ entity: "Machines", filter });
      },
    }),
    defineTool({
      name: "citrix_machine_status",
      description: "Get detailed status for a specific machine by ID or name",
      inputSchema: machineRefInput,
      handler: async (args) => {
        if (args.machine_id) return client.querySingle("Machines", args.machine_id);
        if (args.name) return findFirst(client, "Machines", `Name eq '${args.name}'`);
        throw new InvalidArgumentError("Either machine_id or name is required");
      },
    }),
    defineTool({
      name: "citrix_machine_metrics",
      description: "Get CPU and memory usage metrics for a machine",
      inputSchema: machineRefInput,
      handler: async (args) => {
        const machineId = await resolveId(client, "Machines", "Name", args.machine_id, args.name);
        if (machineId === undefined) return [];
        return client.query({
          entity: "ResourceUtilization",
          filter: `MachineId eq ${machineId}`,
          orderby: "CreatedDate desc",
        });
      },
    }),
    defineTool({
      name: "citrix_machine_failures",
      description: "Get failure logs for a specific machine",
      inputSchema: machineRefInput,
      handler: async (args) => {
        const machineId = await resolveId(client, "Machines", "Name", args.machine_id, args.name);
        if (machineId === undefined) return [];
        return client.query({
          entity: "MachineFailureLogs",
          filter: `MachineId eq ${machineId}`,
          orderby: "FailureStartDate desc",
        });
      },
    }),
  ];
}
