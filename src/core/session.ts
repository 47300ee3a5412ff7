import https from "node:https";

import axios, { AxiosInstance, AxiosResponse } from "axios";
import { NtlmClient } from "axios-ntlm";

import { resolveCloudEndpoint } from "./config.js";
import { AuthenticationError, ConfigurationError, toTransportError } from "./errors.js";
import { CloudCredential, CoreConfig, JsonObject } from "./types.js";
import { isPlainObject, logInfo } from "./utils.js";

const ONPREM_ODATA_PATH = "/Citrix/Monitor/OData/v4/Data";
const CLOUD_ODATA_PATH = "/monitorodata";
const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const EXPIRY_MARGIN_SECONDS = 300;

export type SessionManagerOptions = {
  now?: () => number;
};

type CloudCredentials = {
  customerId: string;
  clientId: string;
  clientSecret: string;
};

type OnPremCredentials = {
  username: string;
  password: string;
};

function parseExpiresIn(raw: unknown): number {
  const n = typeof raw === "string" ? Number(raw) : raw;
  return typeof n === "number" && Number.isFinite(n) ? n : DEFAULT_EXPIRES_IN_SECONDS;
}

/**
 * Owns the one HTTP context shared by every query in the process.
 *
 * Cloud deployments authenticate with a client-credentials bearer token that
 * is cached until five minutes before it expires. The current credential is
 * swapped wholesale on refresh and stamped onto each request by an
 * interceptor, so the axios instance itself is built once and never rebuilt.
 * On-premises deployments use an NTLM client instead and have no token.
 */
export class SessionManager {
  readonly config: CoreConfig;

  private readonly now: () => number;

  private readonly tokenHttp: AxiosInstance;

  private http: AxiosInstance | null = null;

  private credential: CloudCredential | null = null;

  constructor(config: CoreConfig, options: SessionManagerOptions = {}) {
    this.config = config;
    this.now = options.now ?? Date.now;
    this.tokenHttp = axios.create({
      timeout: config.httpTimeoutMs,
      httpsAgent: this.createHttpsAgent(false),
    });
  }

  getBaseUrl(): string {
    if (this.config.deployment === "onprem") {
      const host = (this.config.ddcHost ?? "").replace(/\/+$/, "");
      return `${host}${ONPREM_ODATA_PATH}`;
    }
    return `${resolveCloudEndpoint(this.config)}${CLOUD_ODATA_PATH}`;
  }

  getTokenUrl(): string {
    return `${resolveCloudEndpoint(this.config)}/cctrustoauth2/${this.config.customerId ?? ""}/tokens/clients`;
  }

  /** Current credential expiry (ms since epoch), or null before the first exchange. */
  getTokenExpiry(): number | null {
    return this.credential?.expiresAt ?? null;
  }

  async getToken(): Promise<string> {
    if (this.config.deployment !== "cloud") {
      throw new ConfigurationError("Bearer tokens are only used by cloud deployments.");
    }

    const cached = this.credential;
    if (cached && this.now() < cached.expiresAt) return cached.accessToken;

    const { clientId, clientSecret } = this.requireCloudCredentials();
    const tokenUrl = this.getTokenUrl();
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: clientId,
      client_secret: clientSecret,
    });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.tokenHttp.post<unknown>(tokenUrl, body.toString(), {
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
      });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        throw new AuthenticationError(
          `Token exchange failed with HTTP ${error.response.status}.`,
          error.response.status,
          error.response.data,
        );
      }
      throw toTransportError(error, tokenUrl);
    }

    const data: JsonObject = isPlainObject(response.data) ? response.data : {};
    const accessToken = data.access_token;
    if (typeof accessToken !== "string" || !accessToken) {
      throw new AuthenticationError("Token response missing access_token.");
    }

    const expiresIn = parseExpiresIn(data.expires_in);
    const credential: CloudCredential = {
      accessToken,
      expiresAt: this.now() + (expiresIn - EXPIRY_MARGIN_SECONDS) * 1000,
    };
    this.credential = credential;
    logInfo("auth.token.acquired", {
      region: this.config.region,
      expiresAt: new Date(credential.expiresAt).toISOString(),
    });
    return credential.accessToken;
  }

  async getSession(): Promise<AxiosInstance> {
    if (!this.http) {
      this.http = this.config.deployment === "cloud" ? this.createCloudHttp() : this.createOnPremHttp();
    }
    if (this.config.deployment === "cloud") {
      await this.getToken();
    }
    return this.http;
  }

  async refreshIfNeeded(): Promise<void> {
    if (this.config.deployment !== "cloud") return;
    const previous = this.credential?.accessToken;
    const current = await this.getToken();
    if (previous !== undefined && previous !== current) {
      logInfo("auth.token.refreshed", { region: this.config.region });
    }
  }

  private createHttpsAgent(keepAlive: boolean): https.Agent {
    return new https.Agent({ keepAlive, rejectUnauthorized: this.config.verifySsl });
  }

  private createCloudHttp(): AxiosInstance {
    const { customerId } = this.requireCloudCredentials();
    const http = axios.create({
      timeout: this.config.httpTimeoutMs,
      httpsAgent: this.createHttpsAgent(true),
      headers: {
        Accept: "application/json",
        "Citrix-CustomerId": customerId,
      },
    });
    http.interceptors.request.use((request) => {
      const current = this.credential;
      if (current) {
        request.headers.set("Authorization", `CWSAuth bearer=${current.accessToken}`);
      }
      return request;
    });
    return http;
  }

  private createOnPremHttp(): AxiosInstance {
    const { username, password } = this.requireOnPremCredentials();
    return NtlmClient(
      {
        username,
        password,
        domain: this.config.domain,
      },
      {
        timeout: this.config.httpTimeoutMs,
        httpsAgent: this.createHttpsAgent(true),
        headers: { Accept: "application/json" },
      },
    );
  }

  private requireCloudCredentials(): CloudCredentials {
    const { customerId, clientId, clientSecret } = this.config;
    if (!customerId || !clientId || !clientSecret) {
      throw new ConfigurationError(
        "Missing cloud credentials. Set CITRIX_CUSTOMER_ID, CITRIX_CLIENT_ID, and CITRIX_CLIENT_SECRET.",
      );
    }
    return { customerId, clientId, clientSecret };
  }

  private requireOnPremCredentials(): OnPremCredentials {
    const { username, password } = this.config;
    if (!username || !password) {
      throw new ConfigurationError("Missing on-prem credentials. Set CITRIX_USERNAME and CITRIX_PASSWORD.");
    }
    if (!this.config.ddcHost) {
      throw new ConfigurationError("Missing on-prem Delivery Controller. Set CITRIX_DDC_HOST.");
    }
    return { username, password };
  }
}
