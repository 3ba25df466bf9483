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
 * Startup: load the config file, resolve the OAuth config, log a summary.
 */

import { isPlainObject, redactSensitiveValues } from "./config/env-substitute.js";
import { computeConfigHash } from "./config/hasher.js";
import { loadRawConfigFromFile } from "./config/index.js";
import { createCanonicalUrlProvider, parseAllowedHosts } from "./http/canonical-url.js";
import { CONF_SECTION, type GitHubOAuthConfig, resolveOAuthConfig } from "./oauth/config.js";

export type StartupLogger = Pick<Console, "log" | "error">;

export interface StartupOptions {
  configFile: string;
  env?: Record<string, string | undefined>;
  logger?: StartupLogger;
  /** Log the effective settings with secrets masked. */
  verbose?: boolean;
}

export interface StartupResult {
  config: GitHubOAuthConfig<Request>;
  configHash: string;
}

/** Keys masked in the settings dump whatever their source. */
const SECRET_KEYS: ReadonlyArray<readonly [section: string, key: string]> = [
  [CONF_SECTION, "clientSecret"],
];

function maskSecretKeys(sections: Record<string, unknown>): Record<string, unknown> {
  const masked = { ...sections };
  for (const [section, key] of SECRET_KEYS) {
    const values = masked[section];
    if (isPlainObject(values) && key in values) {
      masked[section] = { ...values, [key]: "[REDACTED]" };
    }
  }
  return masked;
}

export async function startup(options: StartupOptions): Promise<StartupResult> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? console;

  const loaded = await loadRawConfigFromFile(options.configFile, { env });
  logger.log(`[config] Loaded ${loaded.sourceFile}`);
  if (options.verbose) {
    logger.log(
      "[config] Effective settings:",
      JSON.stringify(
        maskSecretKeys(redactSensitiveValues({ ...loaded.sections }, loaded.sensitiveVars, env)),
      ),
    );
  }

  const canonicalWebUrl = createCanonicalUrlProvider(loaded.config, {
    allowedHosts: parseAllowedHosts(env.ALLOWED_CALLBACK_HOSTS),
  });
  const config = resolveOAuthConfig(loaded.config, canonicalWebUrl);
  const configHash = computeConfigHash(loaded.sections);

  logger.log(`[config] GitHub OAuth enabled: ${config.enabled}`);
  logger.log(
    `[config] Scope groups: ${config.sortedScopesKeys.map((key) => key.name).join(", ") || "(none)"}`,
  );
  logger.log(`[config] Config hash: ${configHash} (SHA-256)`);

  return { config, configHash };
}
