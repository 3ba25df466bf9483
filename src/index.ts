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
 * Application entry point.
 * Loads dotenv, resolves the GitHub OAuth config, logs the config hash.
 */

import { join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { startup } from "./startup.js";

async function main(): Promise<void> {
  loadDotenv();

  const configFile = process.env.CONFIG_FILE ?? join(process.cwd(), "config", "gerrit.yaml");

  try {
    await startup({ configFile, verbose: process.env.CONFIG_VERBOSE === "true" });
  } catch (error) {
    console.error("ERROR: Config startup failed");
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
