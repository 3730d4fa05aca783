// Kernel variant definitions from YAML files. Each *.yaml / *.yml file holds either
// a single definition or a list of them, or a document with a kernel_variants list.
// Files that fail to parse or validate are skipped and reported in errors.
import { readFileSync, readdirSync, existsSync, statSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { variantDefinitionSchema, type VariantDefinition } from "../types/config.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

const definitionFileSchema = z.union([
  variantDefinitionSchema,
  z.array(variantDefinitionSchema),
  z.object({ kernel_variants: z.array(variantDefinitionSchema) }),
]);

export interface LoadedDefinitions {
  definitions: Array<{ source: string; definition: VariantDefinition }>;
  errors: string[];
}

/** Load definitions from every file or directory in paths, in order. */
export function loadVariantDefinitions(paths: readonly string[]): LoadedDefinitions {
  const result: LoadedDefinitions = { definitions: [], errors: [] };
  for (const path of paths) {
    if (!existsSync(path)) {
      logger.debug({ path }, "Kernel variant path not found");
      continue;
    }
    try {
      const files = statSync(path).isDirectory()
        ? readdirSync(path).filter((f) => f.endsWith(".yaml") || f.endsWith(".yml")).sort().map((f) => join(path, f))
        : [path];
      for (const file of files) loadFile(file, result);
    } catch (err) {
      logger.warn({ path, error: errorMessage(err) }, "Could not read kernel variant path");
      result.errors.push(`${path}: ${errorMessage(err)}`);
    }
  }
  logger.info({ loaded: result.definitions.length, errors: result.errors.length }, "Kernel variant definitions loaded");
  return result;
}

function loadFile(file: string, result: LoadedDefinitions): void {
  try {
    const parsed = definitionFileSchema.safeParse(parseYaml(readFileSync(file, "utf-8")));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      result.errors.push(`${file}: invalid kernel variant definition${issue ? ` (${issue.path.join(".")}: ${issue.message})` : ""}`);
      return;
    }
    const data = parsed.data;
    const definitions = Array.isArray(data) ? data : "kernel_variants" in data ? data.kernel_variants : [data];
    for (const definition of definitions) result.definitions.push({ source: file, definition });
  } catch (err) {
    result.errors.push(`${file}: ${errorMessage(err)}`);
  }
}
