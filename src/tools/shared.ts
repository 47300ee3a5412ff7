import * as z from "zod/v4";

import { MonitorQueryClient, ODataRecord } from "../core/types.js";
import { isPlainObject } from "../core/utils.js";

export type ToolContext = {
  client: MonitorQueryClient;
  now: () => number;
};

export const DEFAULT_LOOKBACK_DAYS = 7;

export const customFilter = z.string().optional().describe("Custom OData filter expression");

export const lookbackDays = z
  .number()
  .int()
  .positive()
  .default(DEFAULT_LOOKBACK_DAYS)
  .describe(`Number of days to look back (default: ${DEFAULT_LOOKBACK_DAYS})`);

export type EntityKey = string | number;

export function recordId(record: ODataRecord | null | undefined): EntityKey | undefined {
  const id = record?.Id;
  return typeof id === "number" || typeof id === "string" ? id : undefined;
}

/** First record of `entity` matching `filter`, fetched with `$top=1`. */
export async function findFirst(client: MonitorQueryClient, entity: string, filter: string): Promise<ODataRecord | null> {
  const [first] = await client.query({ entity, filter, top: 1 });
  return isPlainObject(first) ? first : null;
}

/**
 * Resolves a numeric id and/or a display name into the id to filter on. A name
 * that matches a record wins over the id; an unknown name falls back to it.
 */
export async function resolveId(
  client: MonitorQueryClient,
  entity: string,
  nameField: string,
  id: number | undefined,
  name: string | undefined,
): Promise<EntityKey | undefined> {
  if (name) {
    const match = recordId(await findFirst(client, entity, `${nameField} eq '${name}'`));
    if (match !== undefined) return match;
  }
  return id || undefined;
}
