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
 * Zod schema for the config document shape.
 * Sections map keys to scalars or to one level of subsection.
 */

import { z } from "zod";

export const ConfigScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SubsectionSchema = z.record(z.string(), ConfigScalarSchema);

export const SectionSchema = z.record(z.string(), z.union([ConfigScalarSchema, SubsectionSchema]));

export const ConfigDocumentSchema = z.record(z.string(), SectionSchema, {
  invalid_type_error: "Config document must be a mapping of sections",
});

export type ConfigDocumentParsed = z.output<typeof ConfigDocumentSchema>;
