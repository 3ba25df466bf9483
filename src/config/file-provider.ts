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
 * FileConfigProvider — reads a YAML or JSON config document from disk.
 */

import { readFile } from "node:fs/promises";
import { parse as parsePath } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "./errors.js";

const SUPPORTED_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

export class FileConfigProvider {
  readonly filePath: string;

  constructor(filePath: string) {
    const ext = parsePath(filePath).ext.toLowerCase();
    if (!SUPPORTED_EXTENSIONS.has(ext)) {
      throw new ConfigError({
        file: filePath,
        message: `Unsupported config file extension "${ext}" (expected .yaml, .yml or .json)`,
      });
    }
    this.filePath = filePath;
  }

  /**
   * Returns the raw text content of the file (before env substitution).
   */
  async loadRawText(): Promise<string> {
    try {
      return await readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw new ConfigError({
          file: this.filePath,
          message: `Config file not found: ${this.filePath}`,
        });
      }
      throw error;
    }
  }

  /**
   * Parse substituted text. The result is unvalidated.
   * YAML uses the failsafe schema: scalars keep their source text, so
   * `00123` or `12e45` stay strings.
   */
  parse(content: string): unknown {
    const isJson = parsePath(this.filePath).ext.toLowerCase() === ".json";
    try {
      return isJson ? JSON.parse(content) : parseYaml(content, { schema: "failsafe" });
    } catch (error) {
      throw new ConfigError({
        file: this.filePath,
        message: `Failed to parse ${isJson ? "JSON" : "YAML"}: ${(error as Error).message}`,
      });
    }
  }
}
