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
import {
  SCOPE_NAMES,
  isScope,
  parseScope,
  scopeDescription,
  scopeValue,
  toScopeParam,
} from "../../../src/oauth/scope.js";

describe("parseScope", () => {
  it("maps canonical names to scopes", () => {
    expect(parseScope("REPO")).toBe("REPO");
    expect(parseScope("USER_EMAIL")).toBe("USER_EMAIL");
  });

  it("is case-sensitive", () => {
    expect(parseScope("repo")).toBeUndefined();
    expect(parseScope("User_Email")).toBeUndefined();
  });

  it("does not accept wire values", () => {
    expect(parseScope("user:email")).toBeUndefined();
  });

  it("rejects inherited object keys", () => {
    expect(isScope("toString")).toBe(false);
    expect(isScope("constructor")).toBe(false);
  });

  it("recognizes every member of the enumeration", () => {
    for (const name of SCOPE_NAMES) {
      expect(parseScope(name)).toBe(name);
    }
  });
});

describe("scopeValue", () => {
  it("returns the value GitHub expects", () => {
    expect(scopeValue("REPO")).toBe("repo");
    expect(scopeValue("USER_EMAIL")).toBe("user:email");
    expect(scopeValue("READ_ORG")).toBe("read:org");
    expect(scopeValue("DEFAULT")).toBe("");
  });
});

describe("scopeDescription", () => {
  it("describes the permission", () => {
    expect(scopeDescription("GIST")).toBe("Write access to gists");
  });
});

describe("toScopeParam", () => {
  it("joins wire values with spaces", () => {
    expect(toScopeParam(["USER_EMAIL", "REPO"])).toBe("user:email repo");
  });

  it("drops duplicates and the empty default scope", () => {
    expect(toScopeParam(["DEFAULT", "REPO", "REPO", "GIST"])).toBe("repo gist");
  });

  it("returns an empty string for no scopes", () => {
    expect(toScopeParam([])).toBe("");
  });
});
