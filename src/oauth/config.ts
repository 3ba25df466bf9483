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
 * GitHub OAuth configuration resolver.
 * Reads the `github` and `auth` sections once at startup and produces a
 * frozen GitHubOAuthConfig. Missing credentials, unknown scope names and
 * malformed numbers abort resolution; no partial config is returned.
 */

import { convertDuration } from "../config/duration.js";
import { MissingRequiredValueError } from "../config/errors.js";
import type { RawConfig } from "../config/provider.js";
import type { CanonicalUrlProvider } from "../http/canonical-url.js";
import type { Scope } from "./scope.js";
import { type ScopeCatalog, type ScopeKey, buildScopeCatalog } from "./scope-catalog.js";

export const CONF_SECTION = "github";
export const AUTH_SECTION = "auth";

export const GITHUB_OAUTH_AUTHORIZE = "/login/oauth/authorize";
export const GITHUB_OAUTH_ACCESS_TOKEN = "/login/oauth/access_token";
export const GITHUB_GET_USER = "/user";
export const OAUTH_FINAL = "/oauth";
export const LOGIN_PATH = "/login";
export const LOGOUT_PATH = "/logout";
export const GITHUB_URL_DEFAULT = "https://github.com";
export const GITHUB_API_URL_DEFAULT = "https://api.github.com";
export const SCOPE_SELECTION_PATH_DEFAULT = "/plugins/github-plugin/static/scope.html";

/** auth.type value that turns the integration on. */
export const HTTP_AUTH_TYPE = "HTTP";

export const FILE_UPDATE_MAX_RETRY_COUNT_DEFAULT = 3;
export const FILE_UPDATE_MAX_RETRY_INTERVAL_MSEC_DEFAULT = 3000;
export const HTTP_TIMEOUT_SECONDS_DEFAULT = 30;

const DEFAULT_SCOPES_KEY = "scopes";

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export interface GitHubOAuthSettings {
  readonly enabled: boolean;
  readonly httpHeader: string;
  readonly oauthHttpHeader: string | undefined;
  readonly gitHubUrl: string;
  readonly gitHubApiUrl: string;
  readonly gitHubClientId: string;
  readonly gitHubClientSecret: string;
  readonly gitHubOAuthUrl: string;
  readonly gitHubOAuthAccessTokenUrl: string;
  readonly gitHubUserUrl: string;
  readonly logoutRedirectUrl: string | undefined;
  readonly scopeSelectionPath: string;
  readonly fileUpdateMaxRetryCount: number;
  readonly fileUpdateMaxRetryIntervalMsec: number;
  /** milliseconds */
  readonly httpConnectionTimeout: number;
  /** milliseconds */
  readonly httpReadTimeout: number;
  readonly scopes: ScopeCatalog;
  readonly sortedScopesKeys: readonly ScopeKey[];
}

export class GitHubOAuthConfig<TRequest = Request> implements GitHubOAuthSettings {
  readonly enabled: boolean;
  readonly httpHeader: string;
  readonly oauthHttpHeader: string | undefined;
  readonly gitHubUrl: string;
  readonly gitHubApiUrl: string;
  readonly gitHubClientId: string;
  readonly gitHubClientSecret: string;
  readonly gitHubOAuthUrl: string;
  readonly gitHubOAuthAccessTokenUrl: string;
  readonly gitHubUserUrl: string;
  readonly logoutRedirectUrl: string | undefined;
  readonly scopeSelectionPath: string;
  readonly fileUpdateMaxRetryCount: number;
  readonly fileUpdateMaxRetryIntervalMsec: number;
  readonly httpConnectionTimeout: number;
  readonly httpReadTimeout: number;
  readonly scopes: ScopeCatalog;
  readonly sortedScopesKeys: readonly ScopeKey[];

  private readonly canonicalWebUrl: CanonicalUrlProvider<TRequest>;

  constructor(settings: GitHubOAuthSettings, canonicalWebUrl: CanonicalUrlProvider<TRequest>) {
    this.enabled = settings.enabled;
    this.httpHeader = settings.httpHeader;
    this.oauthHttpHeader = settings.oauthHttpHeader;
    this.gitHubUrl = settings.gitHubUrl;
    this.gitHubApiUrl = settings.gitHubApiUrl;
    this.gitHubClientId = settings.gitHubClientId;
    this.gitHubClientSecret = settings.gitHubClientSecret;
    this.gitHubOAuthUrl = settings.gitHubOAuthUrl;
    this.gitHubOAuthAccessTokenUrl = settings.gitHubOAuthAccessTokenUrl;
    this.gitHubUserUrl = settings.gitHubUserUrl;
    this.logoutRedirectUrl = settings.logoutRedirectUrl;
    this.scopeSelectionPath = settings.scopeSelectionPath;
    this.fileUpdateMaxRetryCount = settings.fileUpdateMaxRetryCount;
    this.fileUpdateMaxRetryIntervalMsec = settings.fileUpdateMaxRetryIntervalMsec;
    this.httpConnectionTimeout = settings.httpConnectionTimeout;
    this.httpReadTimeout = settings.httpReadTimeout;
    this.scopes = settings.scopes;
    this.sortedScopesKeys = settings.sortedScopesKeys;
    this.canonicalWebUrl = canonicalWebUrl;
    Object.freeze(this);
  }

  /**
   * Where GitHub sends the browser back to after authorization.
   * Without a request only the path is known.
   */
  finalRedirectUrl(request?: TRequest | null): string {
    if (request === undefined || request === null) return OAUTH_FINAL;
    return trimTrailingSlash(this.canonicalWebUrl.get(request)) + OAUTH_FINAL;
  }

  scopeSelectionUrl(request?: TRequest | null): string {
    const canonicalUrl =
      request === undefined || request === null
        ? ""
        : trimTrailingSlash(this.canonicalWebUrl.get(request));
    return canonicalUrl + this.scopeSelectionPath;
  }

  /**
   * Scopes of the unqualified `scopes` group; empty when it is not configured.
   */
  defaultScopes(): readonly Scope[] {
    return this.scopes.get(DEFAULT_SCOPES_KEY)?.scopes ?? [];
  }

  scopesFor(name: string): readonly Scope[] | undefined {
    return this.scopes.get(name)?.scopes;
  }

  /**
   * Plain view for logging; the client secret is masked.
   */
  toJSON(): Record<string, unknown> {
    return {
      enabled: this.enabled,
      httpHeader: this.httpHeader,
      oauthHttpHeader: this.oauthHttpHeader,
      gitHubUrl: this.gitHubUrl,
      gitHubApiUrl: this.gitHubApiUrl,
      gitHubClientId: this.gitHubClientId,
      gitHubClientSecret: "[REDACTED]",
      gitHubOAuthUrl: this.gitHubOAuthUrl,
      gitHubOAuthAccessTokenUrl: this.gitHubOAuthAccessTokenUrl,
      gitHubUserUrl: this.gitHubUserUrl,
      logoutRedirectUrl: this.logoutRedirectUrl,
      scopeSelectionPath: this.scopeSelectionPath,
      fileUpdateMaxRetryCount: this.fileUpdateMaxRetryCount,
      fileUpdateMaxRetryIntervalMsec: this.fileUpdateMaxRetryIntervalMsec,
      httpConnectionTimeout: this.httpConnectionTimeout,
      httpReadTimeout: this.httpReadTimeout,
      scopes: this.sortedScopesKeys.map((key) => ({
        name: key.name,
        description: key.description,
        sequence: key.sequence,
        scopes: [...(this.scopes.get(key.name)?.scopes ?? [])],
      })),
    };
  }
}

function requireString(config: RawConfig, section: string, key: string, message: string): string {
  const value = config.getString(section, null, key);
  if (value === undefined || value.trim() === "") {
    throw new MissingRequiredValueError(`${section}.${key}`, message);
  }
  return value;
}

function optionalString(config: RawConfig, section: string, key: string): string | undefined {
  const value = config.getString(section, null, key);
  return value === undefined || value === "" ? undefined : value;
}

function timeoutMsec(config: RawConfig, key: string): number {
  const seconds = config.getDuration(
    CONF_SECTION,
    null,
    key,
    HTTP_TIMEOUT_SECONDS_DEFAULT,
    "seconds",
  );
  return convertDuration(seconds, "seconds", "milliseconds");
}

/**
 * Resolve the OAuth configuration from the server config store.
 * @throws MissingRequiredValueError when auth.httpHeader, github.clientId or
 *   github.clientSecret is absent or empty.
 * @throws UnknownScopeTokenError when a scope group names an unknown scope.
 * @throws InvalidValueError when a number or duration cannot be parsed.
 */
export function resolveOAuthConfig<TRequest = Request>(
  config: RawConfig,
  canonicalWebUrl: CanonicalUrlProvider<TRequest>,
): GitHubOAuthConfig<TRequest> {
  const httpHeader = requireString(
    config,
    AUTH_SECTION,
    "httpHeader",
    "HTTP header for GitHub user must be provided (auth.httpHeader)",
  );
  const gitHubUrl = trimTrailingSlash(
    optionalString(config, CONF_SECTION, "url") ?? GITHUB_URL_DEFAULT,
  );
  const gitHubApiUrl = trimTrailingSlash(
    optionalString(config, CONF_SECTION, "apiUrl") ?? GITHUB_API_URL_DEFAULT,
  );
  const gitHubClientId = requireString(
    config,
    CONF_SECTION,
    "clientId",
    "GitHub `clientId` must be provided (github.clientId)",
  );
  const gitHubClientSecret = requireString(
    config,
    CONF_SECTION,
    "clientSecret",
    "GitHub `clientSecret` must be provided (github.clientSecret)",
  );

  const authType = config.getString(AUTH_SECTION, null, "type");
  const { catalog, sortedKeys } = buildScopeCatalog(config, CONF_SECTION);

  return new GitHubOAuthConfig(
    {
      enabled: authType !== undefined && authType.toUpperCase() === HTTP_AUTH_TYPE,
      httpHeader,
      oauthHttpHeader: optionalString(config, AUTH_SECTION, "httpExternalIdHeader"),
      gitHubUrl,
      gitHubApiUrl,
      gitHubClientId,
      gitHubClientSecret,
      gitHubOAuthUrl: gitHubUrl + GITHUB_OAUTH_AUTHORIZE,
      gitHubOAuthAccessTokenUrl: gitHubUrl + GITHUB_OAUTH_ACCESS_TOKEN,
      gitHubUserUrl: gitHubApiUrl + GITHUB_GET_USER,
      logoutRedirectUrl: optionalString(config, CONF_SECTION, "logoutRedirectUrl"),
      scopeSelectionPath:
        optionalString(config, CONF_SECTION, "scopeSelectionUrl") ?? SCOPE_SELECTION_PATH_DEFAULT,
      fileUpdateMaxRetryCount: config.getInt(
        CONF_SECTION,
        "fileUpdateMaxRetryCount",
        FILE_UPDATE_MAX_RETRY_COUNT_DEFAULT,
      ),
      fileUpdateMaxRetryIntervalMsec: config.getInt(
        CONF_SECTION,
        "fileUpdateMaxRetryIntervalMsec",
        FILE_UPDATE_MAX_RETRY_INTERVAL_MSEC_DEFAULT,
      ),
      httpConnectionTimeout: timeoutMsec(config, "httpConnectionTimeout"),
      httpReadTimeout: timeoutMsec(config, "httpReadTimeout"),
      scopes: catalog,
      sortedScopesKeys: sortedKeys,
    },
    canonicalWebUrl,
  );
}
