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
 * OAuth module public API.
 */

export {
  AUTH_SECTION,
  CONF_SECTION,
  GITHUB_API_URL_DEFAULT,
  GITHUB_GET_USER,
  GITHUB_OAUTH_ACCESS_TOKEN,
  GITHUB_OAUTH_AUTHORIZE,
  GITHUB_URL_DEFAULT,
  GitHubOAuthConfig,
  LOGIN_PATH,
  LOGOUT_PATH,
  OAUTH_FINAL,
  SCOPE_SELECTION_PATH_DEFAULT,
  resolveOAuthConfig,
  trimTrailingSlash,
} from "./config.js";
export type { GitHubOAuthSettings } from "./config.js";
export {
  SCOPE_NAMES,
  isScope,
  parseScope,
  scopeDescription,
  scopeValue,
  toScopeParam,
} from "./scope.js";
export type { Scope } from "./scope.js";
export { buildScopeCatalog, parseScopesString, sortScopeKeys } from "./scope-catalog.js";
export type { ResolvedScopes, ScopeCatalog, ScopeGroup, ScopeKey } from "./scope-catalog.js";
export { createCanonicalUrlProvider } from "../http/canonical-url.js";
export type { CanonicalUrlProvider } from "../http/canonical-url.js";
