import axios from "axios";

/**
 * Base for every failure the monitor layer raises on purpose. Carries the same
 * `statusCode` / `details` pair the dispatch boundary maps into error payloads.
 */
export class MonitorError extends Error {
  readonly statusCode: number;

  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    if (details !== undefined) this.details = details;
  }
}

export class ConfigurationError extends MonitorError {
  constructor(message: string) {
    super(500, message);
  }
}

export class AuthenticationError extends MonitorError {
  readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number, body?: unknown) {
    super(upstreamStatus ?? 401, message, body);
    this.upstreamStatus = upstreamStatus;
  }
}

export class RateLimitExceededError extends MonitorError {
  constructor(maxRetries: number) {
    super(429, `Rate limited after ${maxRetries} retries`);
  }
}

export class UpstreamHttpError extends MonitorError {
  constructor(status: number, url: string, body: unknown, message?: string) {
    super(status, message ?? `Upstream request failed with HTTP ${status}: ${upstreamMessage(body) ?? url}`, body);
  }
}

export class UnknownOperationError extends MonitorError {
  constructor(name: string) {
    super(404, `Unknown tool: ${name}`);
  }
}

export class InvalidArgumentError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
  }
}

export class TransportError extends MonitorError {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(code === "ECONNABORTED" || code === "ETIMEDOUT" ? 504 : 502, message, code);
    this.code = code;
  }
}

function upstreamMessage(body: unknown): string | undefined {
  if (typeof body === "string") {
    const trimmed = body.trim();
    if (!trimmed) return undefined;
    return trimmed.length > 200 ? `${trimmed.slice(0, 197)}...` : trimmed;
  }
  if (body && typeof body === "object" && "error" in body) {
    const error = body.error;
    if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  return undefined;
}

/**
 * Wraps a failure that happened before any HTTP response arrived. Errors are
 * recognized by axios's flag, not by class: axios-ntlm loads its own copy of
 * axios, so its errors are not instances of ours.
 */
export function toTransportError(error: unknown, url: string): MonitorError {
  if (error instanceof MonitorError) return error;
  if (axios.isAxiosError(error)) {
    return new TransportError(`Request to ${url} failed: ${error.message}`, error.code);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request to ${url} failed: ${message}`);
}

export function mapErrorToPayload(error: unknown): { status: number; message: string; details?: unknown } {
  if (error instanceof MonitorError) {
    return { status: error.statusCode, message: error.message, details: error.details };
  }
  if (error instanceof Error) {
    return { status: 500, message: error.message };
  }
  return { status: 500, message: String(error) };
}
