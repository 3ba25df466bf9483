// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Canonical web URL — the externally visible base URL of the server as seen
 * by an inbound request.
 */

import type { RawConfig } from "../config/provider.js";

export interface CanonicalUrlProvider<TRequest = Request> {
  get(request: TRequest): string;
}

export interface CanonicalUrlOptions {
  /**
   * Hostnames permitted to replace the bind address (0.0.0.0) when the
   * request URL carries it. Defaults to localhost.
   */
  allowedHosts?: Iterable<string>;
}

export function parseAllowedHosts(raw: string | undefined): Set<string> {
  return new Set(
    (raw ?? "localhost")
      .split(",")
      .map((h) => h.trim())
      .filter(Boolean),
  );
}

/**
 * Origin of the request with the bind address replaced by the Host header
 * hostname, when that hostname is allowed. Always ends with "/".
 */
export function requestBaseUrl(request: Request, allowedHosts: ReadonlySet<string>): string {
  const url = new URL(request.url);
  if (url.hostname === "0.0.0.0") {
    const hostHeader = request.headers.get("host");
    if (hostHeader) {
      try {
        const parsed = new URL(`http://${hostHeader}`);
        if (allowedHosts.has(parsed.hostname)) {
          url.hostname = parsed.hostname;
          url.port = parsed.port || url.port;
        }
      } catch {
        // malformed Host header: keep the bind address
      }
    }
  }
  return `${url.origin}/`;
}

/**
 * Uses `gerrit.canonicalWebUrl` when configured, else derives the URL from
 * each request.
 */
export function createCanonicalUrlProvider(
  config: RawConfig,
  options: CanonicalUrlOptions = {},
): CanonicalUrlProvider<Request> {
  const configured = config.getString("gerrit", null, "canonicalWebUrl");
  if (configured) {
    return { get: () => configured };
  }

  const allowedHosts = new Set(options.allowedHosts ?? ["localhost"]);
  return { get: (request) => requestBaseUrl(request, allowedHosts) };
}
