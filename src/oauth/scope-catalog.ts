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
 * Scope catalog — named groups of OAuth scopes read from the `github` section.
 *
 * Every key starting with `scopes` defines a group, except the metadata keys
 * `<group>Description` and `<group>Sequence`. Groups are offered to users in
 * ascending `sequence` order; equal sequences keep the order they were
 * declared in.
 */

import { DuplicateScopeKeyError, UnknownScopeTokenError } from "../config/errors.js";
import type { RawConfig } from "../config/provider.js";
import { type Scope, parseScope } from "./scope.js";

export const SCOPES_KEY_PREFIX = "scopes";
export const DESCRIPTION_SUFFIX = "Description";
export const SEQUENCE_SUFFIX = "Sequence";

/** Identity is `name`; description and sequence are display metadata. */
export interface ScopeKey {
  readonly name: string;
  readonly description: string;
  readonly sequence: number;
}

export interface ScopeGroup {
  readonly key: ScopeKey;
  readonly scopes: readonly Scope[];
}

/** Keyed by ScopeKey name. */
export type ScopeCatalog = ReadonlyMap<string, ScopeGroup>;

/**
 * Read-only view over the built groups. It has no mutators, so the catalog
 * cannot drift from the sorted key list after construction.
 */
class FrozenScopeCatalog implements ScopeCatalog {
  readonly #groups: Map<string, ScopeGroup>;

  constructor(groups: Map<string, ScopeGroup>) {
    this.#groups = new Map(groups);
    Object.freeze(this);
  }

  get size(): number {
    return this.#groups.size;
  }

  get(name: string): ScopeGroup | undefined {
    return this.#groups.get(name);
  }

  has(name: string): boolean {
    return this.#groups.has(name);
  }

  forEach(
    callbackfn: (value: ScopeGroup, key: string, map: ScopeCatalog) => void,
    thisArg?: unknown,
  ): void {
    this.#groups.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  entries() {
    return this.#groups.entries();
  }

  keys() {
    return this.#groups.keys();
  }

  values() {
    return this.#groups.values();
  }

  [Symbol.iterator]() {
    return this.#groups[Symbol.iterator]();
  }
}

export interface ResolvedScopes {
  readonly catalog: ScopeCatalog;
  readonly sortedKeys: readonly ScopeKey[];
}

export function isScopeGroupKey(name: string): boolean {
  return (
    name.startsWith(SCOPES_KEY_PREFIX) &&
    !name.endsWith(DESCRIPTION_SUFFIX) &&
    !name.endsWith(SEQUENCE_SUFFIX)
  );
}

/**
 * Parse a comma-separated list of scope names, e.g. "REPO, USER_EMAIL".
 * Order and duplicates are preserved; blank tokens are skipped.
 * @param path dotted key name reported on failure
 * @throws UnknownScopeTokenError on the first token outside the enumeration.
 */
export function parseScopesString(value: string | undefined, path: string): Scope[] {
  if (!value) return [];

  const scopes: Scope[] = [];
  for (const rawToken of value.split(",")) {
    const token = rawToken.trim();
    if (token === "") continue;
    const scope = parseScope(token);
    if (scope === undefined) {
      throw new UnknownScopeTokenError(path, token);
    }
    scopes.push(scope);
  }
  return scopes;
}

/**
 * Stable sort by sequence ascending.
 */
export function sortScopeKeys(keys: Iterable<ScopeKey>): ScopeKey[] {
  return [...keys].sort((a, b) => a.sequence - b.sequence);
}

export function buildScopeCatalog(config: RawConfig, section: string): ResolvedScopes {
  const catalog = new Map<string, ScopeGroup>();

  for (const name of config.getNames(section, true)) {
    if (!isScopeGroupKey(name)) continue;

    const path = `${section}.${name}`;
    if (catalog.has(name)) {
      throw new DuplicateScopeKeyError(path, name);
    }

    const key: ScopeKey = Object.freeze({
      name,
      description: config.getString(section, null, `${name}${DESCRIPTION_SUFFIX}`) ?? "",
      sequence: config.getInt(section, `${name}${SEQUENCE_SUFFIX}`, 0),
    });
    const scopes = parseScopesString(config.getString(section, null, name), path);

    catalog.set(name, Object.freeze({ key, scopes: Object.freeze(scopes) }));
  }

  return {
    catalog: new FrozenScopeCatalog(catalog),
    sortedKeys: Object.freeze(sortScopeKeys([...catalog.values()].map((group) => group.key))),
  };
}
