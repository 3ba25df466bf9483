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
 * SectionedConfig — in-memory RawConfig over a parsed config document.
 * Objects directly under a section are subsections; everything else is a key.
 */

import { parseConfigInt, parseDuration } from "./duration.js";
import type { ConfigScalar, RawConfig, RawSection, RawSections, TimeUnit } from "./provider.js";

function toStringValue(value: ConfigScalar): string {
  return value === null ? "" : String(value);
}

function dottedPath(section: string, subsection: string | null, key: string): string {
  return subsection === null ? `${section}.${key}` : `${section}.${subsection}.${key}`;
}

export class SectionedConfig implements RawConfig {
  private readonly sections: ReadonlyMap<string, RawSection>;

  constructor(sections: RawSections) {
    this.sections = new Map(Object.entries(sections));
  }

  getString(section: string, subsection: string | null, key: string): string | undefined {
    const entries = this.sections.get(section);
    if (!entries) return undefined;

    if (subsection === null) {
      const value = entries[key];
      if (value === undefined || (typeof value === "object" && value !== null)) {
        return undefined;
      }
      return toStringValue(value);
    }

    const sub = entries[subsection];
    if (typeof sub !== "object" || sub === null) return undefined;
    const value = sub[key];
    return value === undefined ? undefined : toStringValue(value);
  }

  getInt(section: string, key: string, defaultValue: number): number {
    const raw = this.getString(section, null, key);
    if (raw === undefined || raw.trim() === "") return defaultValue;
    return parseConfigInt(raw, dottedPath(section, null, key));
  }

  getNames(section: string, recursive = false): ReadonlySet<string> {
    const names = new Set<string>();
    const entries = this.sections.get(section);
    if (!entries) return names;

    for (const [key, value] of Object.entries(entries)) {
      if (typeof value !== "object" || value === null) {
        names.add(key);
      } else if (recursive) {
        for (const subKey of Object.keys(value)) {
          names.add(subKey);
        }
      }
    }
    return names;
  }

  getDuration(
    section: string,
    subsection: string | null,
    key: string,
    defaultValue: number,
    unit: TimeUnit,
  ): number {
    const raw = this.getString(section, subsection, key);
    if (raw === undefined || raw.trim() === "") return defaultValue;
    return parseDuration(raw, unit, dottedPath(section, subsection, key));
  }

  /**
   * Plain copy of the underlying document, for hashing and redacted logging.
   */
  toObject(): RawSections {
    const copy: RawSections = {};
    for (const [name, entries] of this.sections) {
      const section: RawSection = {};
      for (const [key, value] of Object.entries(entries)) {
        section[key] = typeof value === "object" && value !== null ? { ...value } : value;
      }
      copy[name] = section;
    }
    return copy;
  }
}
