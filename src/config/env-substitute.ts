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
 * Environment variable substitution for config files.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Runs on raw YAML/JSON text BEFORE parsing.
 */

import { ConfigError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

const SENSITIVE_PATTERNS = [/_SECRET$/i, /_KEY$/i, /_PASSWORD$/i, /_TOKEN$/i];

export type Env = Record<string, string | undefined>;

export interface SubstitutionResult {
  text: string;
  sensitiveVars: ReadonlySet<string>;
}

function isSensitiveVar(varName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(varName));
}

/**
 * Substitute ${VAR} and ${VAR:-default} references in raw text.
 * @throws ConfigError if a referenced variable is missing and has no default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: Env = process.env,
): SubstitutionResult {
  const errors: ConfigError[] = [];
  const sensitiveVars = new Set<string>();

  const result = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const defaultSepIndex = expr.indexOf(":-");
    const varName = defaultSepIndex === -1 ? expr : expr.slice(0, defaultSepIndex);
    const defaultValue = defaultSepIndex === -1 ? undefined : expr.slice(defaultSepIndex + 2);

    if (isSensitiveVar(varName)) {
      sensitiveVars.add(varName);
    }

    const value = env[varName];
    if (value !== undefined) {
      return value;
    }

    if (defaultValue !== undefined) {
      return defaultValue;
    }

    errors.push(
      new ConfigError({
        file: sourceFile,
        message: `Unresolved environment variable: \${${varName}}`,
      }),
    );
    return match;
  });

  const firstError = errors[0];
  if (firstError) throw firstError;

  return { text: result, sensitiveVars };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive values in a config object for logging.
 * A string is replaced with [REDACTED] when it contains the value of any
 * sensitive variable that was substituted into the file.
 */
export function redactSensitiveValues(
  obj: Record<string, unknown>,
  sensitiveVars: ReadonlySet<string>,
  env: Env = process.env,
): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPlainObject(value)) {
      redacted[key] = redactSensitiveValues(value, sensitiveVars, env);
    } else if (typeof value === "string" && sensitiveVars.size > 0) {
      const isRedacted = [...sensitiveVars].some((varName) => {
        const envValue = env[varName];
        return envValue !== undefined && envValue !== "" && value.includes(envValue);
      });
      redacted[key] = isRedacted ? "[REDACTED]" : value;
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}
