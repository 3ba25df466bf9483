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
 * GitHub OAuth scopes.
 * Config files name scopes by their canonical name (REPO, USER_EMAIL);
 * GitHub receives the wire value (repo, user:email).
 */

export const SCOPE_NAMES = [
  "DEFAULT",
  "USER",
  "USER_EMAIL",
  "USER_FOLLOW",
  "PUBLIC_REPO",
  "REPO",
  "REPO_DEPLOYMENT",
  "REPO_STATUS",
  "DELETE_REPO",
  "NOTIFICATIONS",
  "GIST",
  "READ_REPO_HOOK",
  "WRITE_REPO_HOOK",
  "ADMIN_REPO_HOOK",
  "ADMIN_ORG_HOOK",
  "READ_ORG",
  "WRITE_ORG",
  "ADMIN_ORG",
  "READ_PUBLIC_KEY",
  "WRITE_PUBLIC_KEY",
  "ADMIN_PUBLIC_KEY",
] as const;

export type Scope = (typeof SCOPE_NAMES)[number];

interface ScopeInfo {
  value: string;
  description: string;
}

const SCOPES: Readonly<Record<Scope, ScopeInfo>> = {
  DEFAULT: { value: "", description: "Read-only access to public information" },
  USER: { value: "user", description: "Read/write access to profile info only" },
  USER_EMAIL: { value: "user:email", description: "Read access to a user's email addresses" },
  USER_FOLLOW: { value: "user:follow", description: "Access to follow or unfollow other users" },
  PUBLIC_REPO: {
    value: "public_repo",
    description: "Read/write access to code, commit statuses and deployments for public repositories",
  },
  REPO: {
    value: "repo",
    description: "Read/write access to code, commit statuses and deployments for all repositories",
  },
  REPO_DEPLOYMENT: {
    value: "repo_deployment",
    description: "Access to deployment statuses for public and private repositories",
  },
  REPO_STATUS: {
    value: "repo:status",
    description: "Read/write access to commit statuses for public and private repositories",
  },
  DELETE_REPO: { value: "delete_repo", description: "Access to delete administrable repositories" },
  NOTIFICATIONS: { value: "notifications", description: "Read access to a user's notifications" },
  GIST: { value: "gist", description: "Write access to gists" },
  READ_REPO_HOOK: {
    value: "read:repo_hook",
    description: "Read access to hooks in public or private repositories",
  },
  WRITE_REPO_HOOK: {
    value: "write:repo_hook",
    description: "Read and write access to hooks in public or private repositories",
  },
  ADMIN_REPO_HOOK: {
    value: "admin:repo_hook",
    description: "Read, write, ping and delete access to hooks in public or private repositories",
  },
  ADMIN_ORG_HOOK: {
    value: "admin:org_hook",
    description: "Read, write, ping and delete access to organization hooks",
  },
  READ_ORG: {
    value: "read:org",
    description: "Read-only access to organization membership, projects and teams",
  },
  WRITE_ORG: {
    value: "write:org",
    description: "Publicize and unpublicize organization membership",
  },
  ADMIN_ORG: { value: "admin:org", description: "Fully manage organization, teams and memberships" },
  READ_PUBLIC_KEY: { value: "read:public_key", description: "List and view details for public keys" },
  WRITE_PUBLIC_KEY: {
    value: "write:public_key",
    description: "Create, list and view details for public keys",
  },
  ADMIN_PUBLIC_KEY: { value: "admin:public_key", description: "Fully manage public keys" },
};

const SCOPE_SET: ReadonlySet<string> = new Set(SCOPE_NAMES);

export function isScope(token: string): token is Scope {
  return SCOPE_SET.has(token);
}

/**
 * Exact, case-sensitive lookup by canonical name.
 * Returns undefined for anything outside the enumeration.
 */
export function parseScope(token: string): Scope | undefined {
  return isScope(token) ? token : undefined;
}

export function scopeValue(scope: Scope): string {
  return SCOPES[scope].value;
}

export function scopeDescription(scope: Scope): string {
  return SCOPES[scope].description;
}

/**
 * Space-separated wire values for the `scope` parameter of the authorize URL.
 * Duplicates and the empty DEFAULT value are dropped.
 */
export function toScopeParam(scopes: readonly Scope[]): string {
  const values = new Set<string>();
  for (const scope of scopes) {
    const value = scopeValue(scope);
    if (value) values.add(value);
  }
  return [...values].join(" ");
}
