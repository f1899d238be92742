import { TransportError } from "./errors.js";

export interface Transport {
  get(path: string, params?: Record<string, string>): Promise<string>;
}

export interface TransportConfig {
  baseUrl: string;
  authHeader: string;
  requestTimeoutMs: number;
}

export class JiraTransport implements Transport {
  constructor(private readonly config: TransportConfig) {}

  async get(path: string, params?: Record<string, string>): Promise<string> {
    const url = this.buildUrl(path, params);
    const headers = new Headers();

    headers.set("Accept", "application/json");
    headers.set("Authorization", this.config.authHeader);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers,
        signal: controller.signal
      });
    } catch (error) {
      clearTimeout(timeout);
      if (error instanceof DOMException && error.name === "AbortError") {
        throw new TransportError(
          `GET ${pathOf(url)} timed out after ${this.config.requestTimeoutMs}ms.`,
          null,
          "",
          { cause: error }
        );
      }

      throw new TransportError(`GET ${pathOf(url)} failed: ${describeCause(error)}`, null, "", {
        cause: error
      });
    }

    try {
      if (!response.ok) {
        const body = await safeReadBody(response);
        throw new TransportError(
          `GET ${pathOf(url)} failed with ${response.status} ${response.statusText}`,
          response.status,
          body
        );
      }

      return await response.text();
    } finally {
      clearTimeout(timeout);
    }
  }

  buildUrl(path: string, params?: Record<string, string>): string {
    if (!params) {
      return `${this.config.baseUrl}${path}`;
    }

    const url = new URL(`${this.config.baseUrl}${path}`);
    url.search = new URLSearchParams(params).toString();
    return url.toString();
  }
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

async function safeReadBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, 4_000);
  } catch {
    return "";
  }
}
