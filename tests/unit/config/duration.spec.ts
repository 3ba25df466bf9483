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

import { describe, expect, it } from "vitest";
import { convertDuration, parseConfigInt, parseDuration } from "../../../src/config/duration.js";
import { InvalidValueError } from "../../../src/config/errors.js";

describe("parseConfigInt", () => {
  it("parses plain integers", () => {
    expect(parseConfigInt("3", "github.n")).toBe(3);
    expect(parseConfigInt(" 42 ", "github.n")).toBe(42);
    expect(parseConfigInt("-1", "github.n")).toBe(-1);
  });

  it("applies k, m and g multipliers", () => {
    expect(parseConfigInt("2k", "github.n")).toBe(2048);
    expect(parseConfigInt("1M", "github.n")).toBe(1048576);
    expect(parseConfigInt("1g", "github.n")).toBe(1073741824);
  });

  it("rejects non-integer values with the key name", () => {
    expect(() => parseConfigInt("three", "github.fileUpdateMaxRetryCount")).toThrow(
      'Invalid integer value for github.fileUpdateMaxRetryCount: "three"',
    );
    expect(() => parseConfigInt("1.5", "github.n")).toThrow(InvalidValueError);
  });
});

describe("parseDuration", () => {
  it("uses the caller's unit when no suffix is given", () => {
    expect(parseDuration("30", "seconds", "github.t")).toBe(30);
  });

  it("converts suffixed values into the requested unit", () => {
    expect(parseDuration("1500ms", "milliseconds", "github.t")).toBe(1500);
    expect(parseDuration("2 min", "seconds", "github.t")).toBe(120);
    expect(parseDuration("1h", "minutes", "github.t")).toBe(60);
    expect(parseDuration("1 week", "days", "github.t")).toBe(7);
    expect(parseDuration("1mon", "days", "github.t")).toBe(30);
    expect(parseDuration("1 year", "days", "github.t")).toBe(365);
  });

  it("accepts unit suffixes case-insensitively", () => {
    expect(parseDuration("10 SEC", "seconds", "github.t")).toBe(10);
  });

  it("truncates when converting to a coarser unit", () => {
    expect(parseDuration("1500ms", "seconds", "github.t")).toBe(1);
  });

  it("rejects unknown units, negatives and fractions", () => {
    expect(() => parseDuration("10 fortnights", "seconds", "github.httpReadTimeout")).toThrow(
      'Invalid time unit value for github.httpReadTimeout: "10 fortnights"',
    );
    expect(() => parseDuration("-5", "seconds", "github.t")).toThrow(InvalidValueError);
    expect(() => parseDuration("1.5s", "seconds", "github.t")).toThrow(InvalidValueError);
  });
});

describe("convertDuration", () => {
  it("converts seconds to milliseconds", () => {
    expect(convertDuration(30, "seconds", "milliseconds")).toBe(30000);
  });

  it("truncates toward zero", () => {
    expect(convertDuration(90, "seconds", "minutes")).toBe(1);
  });
});
