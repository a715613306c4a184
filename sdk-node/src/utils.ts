import { isDeepStrictEqual } from "node:util";

import { ConfigurationError } from "./errors.js";
import type { JsonObject } from "./types.js";

export function ensureNotBlank(
  value: string | null | undefined,
  name: string
): string {
  if (value == null || !value.trim()) {
    throw new ConfigurationError(`${name} cannot be null or blank`);
  }
  return value.trim();
}

export function ensureNotNull<T>(value: T | null | undefined, name: string): T {
  if (value == null) {
    throw new ConfigurationError(`${name} cannot be null`);
  }
  return value;
}

export function parseBaseUrl(baseUrl: string | URL): URL {
  let url: URL;
  if (typeof baseUrl === "string") {
    const raw = ensureNotBlank(baseUrl, "baseUrl");
    try {
      url = new URL(raw);
    } catch {
      throw new ConfigurationError(`baseUrl is not a valid URL: ${raw}`);
    }
  } else {
    url = new URL(ensureNotNull(baseUrl, "baseUrl").href);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(
      `baseUrl must use http or https, got ${url.protocol}`
    );
  }
  return url;
}

/**
 * Appends an absolute endpoint path to the base URL, keeping any path prefix
 * the base URL carries. Query and fragment of the base URL are dropped.
 */
export function resolveEndpoint(baseUrl: URL, path: string): URL {
  const url = new URL(baseUrl.href);
  url.pathname = url.pathname.replace(/\/$/, "") + path;
  url.search = "";
  url.hash = "";
  return url;
}

export function freezeCopy<T>(
  map: Readonly<Record<string, T>> | null | undefined
): Readonly<Record<string, T>> {
  return Object.freeze({ ...(map ?? {}) });
}

export function freezeList<T>(
  list: readonly T[] | null | undefined
): readonly T[] {
  return Object.freeze([...(list ?? [])]);
}

export function sameWireForm(
  a: { toJSON(): unknown },
  b: { toJSON(): unknown }
): boolean {
  return isDeepStrictEqual(a.toJSON(), b.toJSON());
}

export function getRequestId(headers: {
  get(name: string): string | null;
}): string | undefined {
  return headers.get("x-request-id") ?? undefined;
}

export function describeFailure(status: number, body: unknown): string {
  if (isJsonObject(body)) {
    if (typeof body.message === "string") return body.message;
    if (typeof body.detail === "string") return body.detail;
  }
  return `Request failed with status ${status}`;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
