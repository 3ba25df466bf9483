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
 * Integer and duration parsing for config values.
 * Integers take an optional k/m/g suffix (powers of 1024).
 * Durations take an optional unit suffix; bare numbers use the caller's unit.
 */

import { InvalidValueError } from "./errors.js";
import type { TimeUnit } from "./provider.js";

const MS_PER_UNIT: Record<TimeUnit, number> = {
  milliseconds: 1,
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
};

const DURATION_SUFFIXES: ReadonlyMap<string, number> = new Map([
  ["ms", 1],
  ["milliseconds", 1],
  ["s", MS_PER_UNIT.seconds],
  ["sec", MS_PER_UNIT.seconds],
  ["second", MS_PER_UNIT.seconds],
  ["seconds", MS_PER_UNIT.seconds],
  ["m", MS_PER_UNIT.minutes],
  ["min", MS_PER_UNIT.minutes],
  ["minute", MS_PER_UNIT.minutes],
  ["minutes", MS_PER_UNIT.minutes],
  ["h", MS_PER_UNIT.hours],
  ["hr", MS_PER_UNIT.hours],
  ["hour", MS_PER_UNIT.hours],
  ["hours", MS_PER_UNIT.hours],
  ["d", MS_PER_UNIT.days],
  ["day", MS_PER_UNIT.days],
  ["days", MS_PER_UNIT.days],
  ["w", 7 * MS_PER_UNIT.days],
  ["week", 7 * MS_PER_UNIT.days],
  ["weeks", 7 * MS_PER_UNIT.days],
  ["mon", 30 * MS_PER_UNIT.days],
  ["month", 30 * MS_PER_UNIT.days],
  ["months", 30 * MS_PER_UNIT.days],
  ["y", 365 * MS_PER_UNIT.days],
  ["year", 365 * MS_PER_UNIT.days],
  ["years", 365 * MS_PER_UNIT.days],
]);

const INT_PATTERN = /^([+-]?\d+)\s*([kmg]?)$/i;
const DURATION_PATTERN = /^(0|[1-9]\d*)\s*([a-z]*)$/i;

const INT_MULTIPLIERS: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Convert a duration between units, truncating toward zero.
 */
export function convertDuration(value: number, from: TimeUnit, to: TimeUnit): number {
  return Math.trunc((value * MS_PER_UNIT[from]) / MS_PER_UNIT[to]);
}

/**
 * Parse an integer value such as "3", "-1" or "8k".
 * @param path dotted key name, used in the error message
 * @throws InvalidValueError if the value is not an integer.
 */
export function parseConfigInt(value: string, path: string): number {
  const match = value.trim().match(INT_PATTERN);
  const digits = match?.[1];
  if (!match || digits === undefined) {
    throw new InvalidValueError(path, `Invalid integer value for ${path}: "${value}"`);
  }
  const multiplier = INT_MULTIPLIERS[(match[2] ?? "").toLowerCase()] ?? 1;
  const result = Number.parseInt(digits, 10) * multiplier;
  if (!Number.isSafeInteger(result)) {
    throw new InvalidValueError(path, `Integer value out of range for ${path}: "${value}"`);
  }
  return result;
}

/**
 * Parse a duration such as "30", "30 s", "1500ms" or "2 hours" into `unit`.
 * @throws InvalidValueError for negative, fractional or unknown-unit values.
 */
export function parseDuration(value: string, unit: TimeUnit, path: string): number {
  const match = value.trim().match(DURATION_PATTERN);
  const digits = match?.[1];
  if (!match || digits === undefined) {
    throw new InvalidValueError(path, `Invalid time unit value for ${path}: "${value}"`);
  }

  const suffix = (match[2] ?? "").toLowerCase();
  const amount = Number.parseInt(digits, 10);
  if (suffix === "") {
    return amount;
  }

  const msPerSuffix = DURATION_SUFFIXES.get(suffix);
  if (msPerSuffix === undefined) {
    throw new InvalidValueError(path, `Invalid time unit value for ${path}: "${value}"`);
  }
  return Math.trunc((amount * msPerSuffix) / MS_PER_UNIT[unit]);
}
