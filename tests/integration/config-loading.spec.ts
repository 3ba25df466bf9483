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

import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { redactSensitiveValues } from "../../src/config/env-substitute.js";
import { computeConfigHash, loadRawConfigFromFile } from "../../src/config/index.js";
import { createCanonicalUrlProvider } from "../../src/http/canonical-url.js";
import { resolveOAuthConfig } from "../../src/oauth/config.js";

const VALID_YAML = fileURLToPath(new URL("../fixtures/valid/gerrit.yaml", import.meta.url));
const VALID_JSON = fileURLToPath(new URL("../fixtures/valid/gerrit.json", import.meta.url));
const LITERAL_SECRET_YAML = fileURLToPath(
  new URL("../fixtures/valid/literal-secret.yaml", import.meta.url),
);

async function loadAndResolve(file: string, env: Record<string, string | undefined> = {}) {
  const loaded = await loadRawConfigFromFile(file, { env });
  return resolveOAuthConfig(loaded.config, createCanonicalUrlProvider(loaded.config));
}

describe("Config loading pipeline (integration)", () => {
  it("resolves the YAML fixture", async () => {
    const config = await loadAndResolve(VALID_YAML);

    expect(config.enabled).toBe(true);
    expect(config.httpHeader).toBe("GITHUB_USER");
    expect(config.oauthHttpHeader).toBe("GITHUB_OAUTH_TOKEN");
    expect(config.gitHubUrl).toBe("https://github.com");
    expect(config.gitHubOAuthUrl).toBe("https://github.com/login/oauth/authorize");
    expect(config.gitHubClientId).toBe("fixture-client");
    expect(config.httpConnectionTimeout).toBe(10000);
    expect(config.httpReadTimeout).toBe(30000);
    expect(config.fileUpdateMaxRetryCount).toBe(5);
  });

  it("orders scope groups by sequence", async () => {
    const config = await loadAndResolve(VALID_YAML);

    expect(config.sortedScopesKeys).toEqual([
      { name: "scopes", description: "Minimal access", sequence: 0 },
      { name: "scopesOrg", description: "", sequence: 1 },
      { name: "scopesRepo", description: "Repositories", sequence: 2 },
    ]);
    expect(config.scopesFor("scopesRepo")).toEqual(["USER_EMAIL", "PUBLIC_REPO", "REPO"]);
    expect(config.defaultScopes()).toEqual(["USER_EMAIL"]);
  });

  it("uses the configured canonical web URL for redirects", async () => {
    const config = await loadAndResolve(VALID_YAML);
    const request = new Request("http://10.0.0.5:8080/login");

    expect(config.finalRedirectUrl(request)).toBe("https://review.example.com/oauth");
    expect(config.scopeSelectionUrl(request)).toBe(
      "https://review.example.com/plugins/github-plugin/static/scope.html",
    );
  });

  it("substitutes env vars from the environment", async () => {
    const config = await loadAndResolve(VALID_YAML, {
      GH_CLIENT_ID: "env-client",
      GH_CLIENT_SECRET: "env-secret",
    });

    expect(config.gitHubClientId).toBe("env-client");
    expect(config.gitHubClientSecret).toBe("env-secret");
  });

  it("keeps numeric-looking substituted values as their source text", async () => {
    const leadingZero = await loadAndResolve(LITERAL_SECRET_YAML, { GH_CLIENT_ID: "00123" });
    expect(leadingZero.gitHubClientId).toBe("00123");

    const exponent = await loadAndResolve(LITERAL_SECRET_YAML, { GH_CLIENT_ID: "12e45" });
    expect(exponent.gitHubClientId).toBe("12e45");
  });

  it("reads unquoted YAML numbers as strings", async () => {
    const loaded = await loadRawConfigFromFile(LITERAL_SECRET_YAML, {
      env: { GH_CLIENT_ID: "client" },
    });

    expect(loaded.sections.github?.fileUpdateMaxRetryCount).toBe("007");
    expect(loaded.config.getInt("github", "fileUpdateMaxRetryCount", 3)).toBe(7);
  });

  it("resolves the JSON fixture", async () => {
    const config = await loadAndResolve(VALID_JSON);

    expect(config.enabled).toBe(true);
    expect(config.gitHubApiUrl).toBe("https://ghe.example.com/api/v3");
    expect(config.gitHubUserUrl).toBe("https://ghe.example.com/api/v3/user");
    expect(config.httpReadTimeout).toBe(60000);
    expect(config.scopesFor("scopesAll")).toEqual(["REPO", "GIST"]);
    expect(config.defaultScopes()).toEqual([]);
  });

  it("produces a deterministic hash across loads", async () => {
    const first = await loadRawConfigFromFile(VALID_YAML, { env: {} });
    const second = await loadRawConfigFromFile(VALID_YAML, { env: {} });

    expect(computeConfigHash(first.sections)).toMatch(/^[a-f0-9]{64}$/);
    expect(computeConfigHash(first.sections)).toBe(computeConfigHash(second.sections));
  });

  it("tracks and redacts substituted secrets", async () => {
    const env = { GH_CLIENT_SECRET: "env-secret" };
    const loaded = await loadRawConfigFromFile(VALID_YAML, { env });

    expect(loaded.sensitiveVars).toEqual(new Set(["GH_CLIENT_SECRET"]));
    const redacted = redactSensitiveValues({ ...loaded.sections }, loaded.sensitiveVars, env);
    expect((redacted.github as Record<string, unknown>).clientSecret).toBe("[REDACTED]");
    expect((redacted.github as Record<string, unknown>).clientId).toBe("fixture-client");
  });
});
