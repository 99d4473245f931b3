import { Agent, fetch } from "undici";
import type { AppConfig } from "../config";
import type { ApiRequest, Transport, TransportResponse } from "../fetch";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export function createHttpTransport(
  config: Pick<AppConfig, "userAgent" | "ignoreHttpsErrors" | "requestTimeoutMs">,
): Transport {
  return async (request: ApiRequest): Promise<TransportResponse> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);
    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: {
          "user-agent": config.userAgent,
          ...(request.headers ?? {}),
        },
        dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });
      const body = await response.text();
      return {
        status: response.status,
        headers: response.headers,
        text: async () => body,
      };
    } finally {
      clearTimeout(timeout);
    }
  };
}

export function joinUrl(baseUrl: string, ...segments: string[]): string {
  const trimmedBase = baseUrl.replace(/\/+$/, "");
  const path = segments
    .flatMap((segment) => segment.split("/"))
    .filter((part) => part !== "")
    .map((part) => encodeURIComponent(part))
    .join("/");
  return path ? `${trimmedBase}/${path}` : trimmedBase;
}
