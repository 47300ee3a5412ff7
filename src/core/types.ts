export type JsonObject = Record<string, unknown>;

export type DeploymentMode = "cloud" | "onprem";

export type McpTransportKind = "stdio" | "http";

export type CoreConfig = {
  repoRoot: string;
  deployment: DeploymentMode;
  region: string;
  verifySsl: boolean;
  customerId?: string;
  clientId?: string;
  clientSecret?: string;
  apiEndpoint?: string;
  ddcHost?: string;
  domain: string;
  username?: string;
  password?: string;
  httpTimeoutMs: number;
  maxRetries: number;
  transport: McpTransportKind;
  host: string;
  port: number;
  mcpPath: string;
  healthPath: string;
  serverApiKey: string;
};

export type CloudCredential = {
  accessToken: string;
  expiresAt: number;
};

export type ODataQuery = {
  entity: string;
  filter?: string;
  select?: string[];
  orderby?: string;
  top?: number;
  skip?: number;
  expand?: string[];
  count?: boolean;
};

export type ODataRecord = JsonObject;

/** One decoded collection page. */
export type ODataPage = {
  value: unknown[];
  nextLink?: string;
};

// The Monitor API is read-only.
export type HttpMethod = "GET";

export type RequestOptions = {
  headers?: Record<string, string>;
  responseType?: "json" | "text";
};

/**
 * The read-only query surface the domain tools are written against.
 */
export interface MonitorQueryClient {
  query(spec: ODataQuery): Promise<unknown[]>;
  querySingle(entity: string, key: string | number, expand?: string[]): Promise<ODataRecord | null>;
  aggregate(entity: string, apply: string): Promise<unknown>;
  count(entity: string, filter?: string): Promise<number>;
}
