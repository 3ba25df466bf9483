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
 * Public config API.
 * Orchestrates: read → substitute → parse → validate → wrap.
 */

import { substituteEnvVars } from "./env-substitute.js";
import { type ConfigErrorDetail, ConfigValidationError } from "./errors.js";
import { FileConfigProvider } from "./file-provider.js";
import type { LoadConfigOptions, RawSections } from "./provider.js";
import { ConfigDocumentSchema } from "./schema.js";
import { SectionedConfig } from "./sectioned-config.js";

export interface LoadedRawConfig {
  readonly config: SectionedConfig;
  readonly sections: RawSections;
  readonly sourceFile: string;
  readonly sensitiveVars: ReadonlySet<string>;
}

/**
 * Validate a parsed document and wrap it as a RawConfig.
 * @throws ConfigValidationError listing every shape issue.
 */
export function parseConfigDocument(document: unknown, sourceFile?: string): SectionedConfig {
  const result = ConfigDocumentSchema.safeParse(document);
  if (!result.success) {
    const errors: ConfigErrorDetail[] = result.error.issues.map((issue) => ({
      file: sourceFile,
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ConfigValidationError(errors);
  }
  return new SectionedConfig(result.data);
}

/**
 * Load a config file with env var substitution on the raw text.
 * This is the full pipeline: read raw text → substitute → parse → validate.
 */
export async function loadRawConfigFromFile(
  filePath: string,
  options: LoadConfigOptions = {},
): Promise<LoadedRawConfig> {
  const provider = new FileConfigProvider(filePath);
  const raw = await provider.loadRawText();
  const sub = substituteEnvVars(raw, filePath, options.env);
  const config = parseConfigDocument(provider.parse(sub.text), filePath);

  return {
    config,
    sections: config.toObject(),
    sourceFile: filePath,
    sensitiveVars: sub.sensitiveVars,
  };
}

export { computeConfigHash } from "./hasher.js";
export { redactSensitiveValues } from "./env-substitute.js";
export type { RawConfig, RawSections, TimeUnit } from "./provider.js";
export { SectionedConfig } from "./sectioned-config.js";
