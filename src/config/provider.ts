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
 * RawConfig — read interface over a sectioned key/value configuration store.
 * Values are strings; typed accessors parse on read.
 */

export type TimeUnit = "milliseconds" | "seconds" | "minutes" | "hours" | "days";

export interface RawConfig {
  /**
   * Returns the raw value, or undefined when the key is not set.
   * Pass null as subsection for keys directly under the section.
   */
  getString(section: string, subsection: string | null, key: string): string | undefined;
  getInt(section: string, key: string, defaultValue: number): number;
  /**
   * Key names under a section, in file order. With recursive set,
   * keys of every subsection are included.
   */
  getNames(section: string, recursive?: boolean): Iterable<string>;
  /**
   * Reads a duration and returns it expressed in `unit`.
   * Values without a unit suffix are taken to be in `unit`.
   */
  getDuration(
    section: string,
    subsection: string | null,
    key: string,
    defaultValue: number,
    unit: TimeUnit,
  ): number;
}

export type ConfigScalar = string | number | boolean | null;

export interface RawSection {
  [key: string]: ConfigScalar | Record<string, ConfigScalar>;
}

export interface RawSections {
  [section: string]: RawSection;
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
}
