import * as z from "zod/v4";

import { InvalidArgumentError, UnknownOperationError, mapErrorToPayload } from "../core/errors.js";
import { redactForLog } from "../core/policy.js";
import { JsonObject } from "../core/types.js";
import { isPlainObject, logInfo, logWarn } from "../core/utils.js";

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonObject>;
  required: string[];
  additionalProperties: false;
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export type RegisteredTool = ToolDescriptor & {
  run(args: unknown): Promise<unknown>;
};

export type ToolCallOutcome = {
  text: string;
  isError: boolean;
};

function toInputSchema(schema: z.ZodType): ToolInputSchema {
  const json: unknown = z.toJSONSchema(schema, { io: "input" });
  const properties: Record<string, JsonObject> = {};
  if (isPlainObject(json) && isPlainObject(json.properties)) {
    for (const [key, value] of Object.entries(json.properties)) {
      if (isPlainObject(value)) properties[key] = value;
    }
  }
  const required = isPlainObject(json) && Array.isArray(json.required) ? json.required.filter((r): r is string => typeof r === "string") : [];
  return { type: "object", properties, required, additionalProperties: false };
}

/**
 * Binds a zod input schema to its handler. Arguments are parsed before the
 * handler runs, so handlers only ever see typed, defaulted input.
 */
export function defineTool<S extends z.ZodType>(def: {
  name: string;
  description: string;
  inputSchema: S;
  handler: (args: z.output<S>) => Promise<unknown>;
}): RegisteredTool {
  return {
    name: def.name,
    description: def.description,
    inputSchema: toInputSchema(def.inputSchema),
    async run(args: unknown): Promise<unknown> {
      const parsed = def.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidArgumentError(`Invalid arguments for ${def.name}: ${z.prettifyError(parsed.error)}`);
      }
      return def.handler(parsed.data);
    },
  };
}

export function formatResult(value: unknown): string {
  return JSON.stringify(value ?? null, null, 2);
}

/**
 * Name → tool lookup table, fixed at construction. Dispatch never throws:
 * every failure becomes an `{"error": ...}` payload.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  private readonly redactionFields: Set<string>;

  constructor(tools: RegisteredTool[], redactionFields: Set<string> = new Set()) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name '${tool.name}'.`);
      }
      this.tools.set(tool.name, tool);
    }
    this.redactionFields = redactionFields;
  }

  get size(): number {
    return this.tools.size;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
  }

  async dispatch(name: string, args: unknown): Promise<ToolCallOutcome> {
    const startedAt = Date.now();
    try {
      const tool = this.tools.get(name);
      if (!tool) throw new UnknownOperationError(name);

      const result = await tool.run(args);
      logInfo("tool.call", {
        tool: name,
        status: "ok",
        args: redactForLog(args ?? {}, this.redactionFields),
        durationMs: Date.now() - startedAt,
      });
      return { text: formatResult(result), isError: false };
    } catch (error) {
      const mapped = mapErrorToPayload(error);
      const logPayload: JsonObject = {
        tool: name,
        status: mapped.status,
        error: mapped.message,
        args: redactForLog(args ?? {}, this.redactionFields),
        durationMs: Date.now() - startedAt,
      };
      if (mapped.details !== undefined) logPayload.errorDetails = redactForLog(mapped.details, this.redactionFields);
      logWarn("tool.call", logPayload);
      return { text: formatResult({ error: mapped.message }), isError: true };
    }
  }
}
