import { ODataClient, ODataClientOptions } from "./odata-client.js";
import { SessionManager, SessionManagerOptions } from "./session.js";
import { CoreConfig } from "./types.js";

/**
 * Everything a tool handler needs, built once by the process entry point and
 * passed down explicitly.
 */
export type MonitorContext = {
  config: CoreConfig;
  session: SessionManager;
  client: ODataClient;
};

export type MonitorContextOptions = SessionManagerOptions & ODataClientOptions;

export function createMonitorContext(config: CoreConfig, options: MonitorContextOptions = {}): MonitorContext {
  const session = new SessionManager(config, { now: options.now });
  const client = new ODataClient(session, { maxRetries: options.maxRetries, sleep: options.sleep });
  return { config, session, client };
}
