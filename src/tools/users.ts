import * as z from "zod/v4";

import { InvalidArgumentError } from "../core/errors.js";
import { RegisteredTool, defineTool } from "../mcp/registry.js";
import { ToolContext, customFilter, findFirst, resolveId } from "./shared.js";

const userListInput = z.strictObject({ filter: customFilter });

const userRefInput = z.strictObject({
  user_id: z.number().int().optional().describe("User ID"),
  username: z.string().optional().describe("Username (alternative to user_id)"),
});

export function userTools({ client }: ToolContext): RegisteredTool[] {
  return [
    defineTool({
      name: "citrix_user_list",
      description: "List users in the environment",
      inputSchema: userListInput,
      handler: async (args) => client.query({ entity: "Users", filter: args.filter || undefined }),
    }),
    defineTool({
      name: "citrix_user_details",
      description: "Get details for a specific user",
      inputSchema: userRefInput,
      handler: async (args) => {
        if (args.user_id) return client.querySingle("Users", args.user_id);
        if (args.username) return findFirst(client, "Users", `UserName eq '${args.username}'`);
        throw new InvalidArgumentError("Either user_id or username is required");
      },
    }),
    defineTool({
      name: "citrix_user_sessions",
      description: "Get session history for a specific user",
      inputSchema: userRefInput,
      handler: async (args) => {
        const userId = await resolveId(client, "Users", "UserName", args.user_id, args.username);
        if (userId === undefined) return [];
        return client.query({
          entity: "Sessions",
          filter: `UserId eq ${userId}`,
          expand: ["Machine"],
          orderby: "StartDate desc",
        });
      },
    }),
  ];
}
