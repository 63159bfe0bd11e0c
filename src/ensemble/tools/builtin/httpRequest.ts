/**
 * Built-in `http_request` tool.
 *
 * Outbound requests are restricted to http(s) URLs whose host is not
 * localhost or a private, loopback, link-local, multicast or reserved IP
 * literal. Host names are not resolved.
 */

import { BlockList, isIP } from "node:net";
import { z } from "zod";
import { ValidationError, errorMessage } from "../../errors.js";
import { Tool } from "../tool.js";
import type { ToolContext } from "../types.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH"] as const;

export const DEFAULT_MAX_RESPONSE_BYTES = 1_000_000;

const BLOCKED_HOSTNAMES = new Set(["localhost", "localhost.localdomain", "ip6-localhost", "ip6-loopback"]);

const blockedAddresses = new BlockList();
for (const [network, prefix] of [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.0.2.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
  ["198.51.100.0", 24],
  ["203.0.113.0", 24],
  ["224.0.0.0", 4],
  ["240.0.0.0", 4]
] as const) {
  blockedAddresses.addSubnet(network, prefix, "ipv4");
}
for (const [network, prefix] of [
  ["::", 128],
  ["::1", 128],
  ["fc00::", 7],
  ["fe80::", 10],
  ["ff00::", 8],
  ["2001:db8::", 32]
] as const) {
  blockedAddresses.addSubnet(network, prefix, "ipv6");
}

/**
 * `::ffff:7f00:1` (as WHATWG URL normalizes it) -> `127.0.0.1`.
 */
function mappedIpv4(address: string): string | null {
  const match = /^::ffff:(.+)$/i.exec(address);
  const tail = match?.[1];
  if (!tail) return null;
  if (isIP(tail) === 4) return tail;
  const words = /^([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i.exec(tail);
  if (!words?.[1] || !words[2]) return null;
  const high = parseInt(words[1], 16);
  const low = parseInt(words[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".");
}

export function isBlockedAddress(address: string): boolean {
  const family = isIP(address);
  if (family === 4) return blockedAddresses.check(address, "ipv4");
  if (family === 6) {
    const v4 = mappedIpv4(address);
    if (v4 !== null) return blockedAddresses.check(v4, "ipv4");
    return blockedAddresses.check(address, "ipv6");
  }
  return false;
}

/**
 * Throws ValidationError for URLs the tool must not fetch.
 */
export function validateUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new ValidationError(`Invalid URL: ${errorMessage(err)}`, { url: raw });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`Only HTTP and HTTPS URLs are allowed, got: ${url.protocol.replace(/:$/, "")}`, {
      url: raw
    });
  }
  const host = url.hostname.toLowerCase().replace(/^\[|\]$/g, "");
  if (!host) {
    throw new ValidationError("URL must have a valid hostname", { url: raw });
  }
  if (BLOCKED_HOSTNAMES.has(host) || host.endsWith(".localhost")) {
    throw new ValidationError("Access to localhost is not allowed", { url: raw });
  }
  if (isBlockedAddress(host)) {
    throw new ValidationError(`Access to private/internal IP addresses is not allowed: ${host}`, { url: raw });
  }
  return url;
}

const httpArgsSchema = z.object({
  method: z.string(),
  url: z.string(),
  headers: z.record(z.unknown()).nullable(),
  params: z.record(z.unknown()).nullable(),
  json_body: z.record(z.unknown()).nullable(),
  data_body: z.union([z.record(z.unknown()), z.string()]).nullable(),
  timeout: z.number().positive(),
  max_response_size: z.number().int().positive()
});

export type HttpRequestResult =
  | {
      success: true;
      status_code: number;
      url: string;
      headers: Record<string, string>;
      data: unknown;
    }
  | {
      success: false;
      error: string;
      status_code?: number;
    };

function stringRecord(values: Record<string, unknown> | null): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values ?? {})) {
    if (value !== undefined && value !== null) out[key] = String(value);
  }
  return out;
}

function decodeBody(bytes: Uint8Array, contentType: string): unknown {
  const text = new TextDecoder().decode(bytes);
  if (!contentType.includes("application/json")) return text;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // Mislabelled payloads are returned as text
    return text;
  }
}

export async function httpRequest(rawArgs: Record<string, unknown>, context: ToolContext): Promise<HttpRequestResult> {
  const args = httpArgsSchema.parse(rawArgs);
  const method = args.method.toUpperCase();
  if (!HTTP_METHODS.some((m) => m === method)) {
    throw new ValidationError(`Unsupported HTTP method '${args.method}'`, { allowed: HTTP_METHODS });
  }
  const url = validateUrl(args.url);
  if (args.json_body && args.data_body) {
    throw new ValidationError("Cannot provide both 'json_body' and 'data_body'. Choose one.");
  }

  for (const [key, value] of Object.entries(stringRecord(args.params))) {
    url.searchParams.append(key, value);
  }
  const headers = stringRecord(args.headers);
  let body: string | URLSearchParams | undefined;
  if (args.json_body) {
    body = JSON.stringify(args.json_body);
    headers["content-type"] ??= "application/json";
  } else if (typeof args.data_body === "string") {
    body = args.data_body;
  } else if (args.data_body) {
    body = new URLSearchParams(stringRecord(args.data_body));
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, args.timeout * 1000);
  const onAbort = (): void => controller.abort();
  context.signal.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(url, {
      method,
      headers,
      ...(body !== undefined && { body }),
      signal: controller.signal
    });
    const bytes = new Uint8Array(await response.arrayBuffer());
    if (bytes.byteLength > args.max_response_size) {
      return { success: false, error: "Response size exceeded limit", status_code: response.status };
    }
    return {
      success: true,
      status_code: response.status,
      url: response.url || url.toString(),
      headers: Object.fromEntries(response.headers.entries()),
      data: decodeBody(bytes, response.headers.get("content-type") ?? "")
    };
  } catch (err) {
    if (timedOut) {
      return { success: false, error: "Request timed out" };
    }
    if (context.signal.aborted) {
      throw err;
    }
    return { success: false, error: `Network connection error: ${errorMessage(err)}` };
  } finally {
    clearTimeout(timer);
    context.signal.removeEventListener("abort", onAbort);
  }
}

export function createHttpRequestTool(): Tool<HttpRequestResult> {
  return new Tool({
    name: "http_request",
    description:
      "Make HTTP requests to external APIs. Supports GET, POST, PUT, DELETE and PATCH. " +
      "Validates URLs and limits response size. Can send JSON or form-encoded/raw data.",
    parameters: {
      method: { type: "string", description: "HTTP method" },
      url: { type: "string", description: "Absolute http(s) URL; private and local hosts are rejected" },
      headers: { type: ["object", "null"], default: null },
      params: { type: ["object", "null"], description: "Query parameters", default: null },
      json_body: { type: ["object", "null"], default: null },
      data_body: { type: ["object", "string", "null"], description: "Form fields or raw body", default: null },
      timeout: { type: "number", description: "Request timeout in seconds", default: 10 },
      max_response_size: { type: "integer", description: "Bytes", default: DEFAULT_MAX_RESPONSE_BYTES }
    },
    operation: httpRequest,
    timeout: 60,
    maxRetries: 2,
    retryDelay: 1,
    retryBackoff: true,
    onError: "return_error"
  });
}
