/**
 * Endpoint ordering.
 *
 * The node prefers a rippled it runs itself, then an operator-supplied
 * URL, then a public server. Empty URLs are skipped and a URL listed twice
 * keeps its best rank.
 */

import type { Endpoint, EndpointLabel } from "@pft-node/types";

export interface EndpointSources {
  readonly localUrl?: string | undefined;
  readonly configuredUrl?: string | undefined;
  readonly publicUrl?: string | undefined;
}

const SOURCE_ORDER: readonly (readonly [EndpointLabel, keyof EndpointSources])[] = [
  ["local", "localUrl"],
  ["configured", "configuredUrl"],
  ["public", "publicUrl"],
];

/**
 * Build the ranked candidate list consumed by the ConnectionManager.
 */
export function buildEndpoints(sources: EndpointSources): readonly Endpoint[] {
  const endpoints: Endpoint[] = [];
  const seen = new Set<string>();

  for (const [label, key] of SOURCE_ORDER) {
    const url = sources[key]?.trim();
    if (url === undefined || url === "" || seen.has(url)) continue;

    seen.add(url);
    endpoints.push({ url, rank: endpoints.length, label });
  }

  return endpoints;
}

export function isWebSocketUrl(url: string): boolean {
  return url.startsWith("ws://") || url.startsWith("wss://");
}
