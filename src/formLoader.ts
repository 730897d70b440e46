import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import type { InMemoryFormStore } from "./formEngine.js";
import { logger } from "./logger.js";

const SeedFileSchema = z.object({
  prompt: z.string().trim().min(1),
  schema: z.record(z.unknown()),
});

/** Registers the `{ prompt, schema }` JSON files found in `dir`. Returns the count. */
export function loadFormsFromDir(store: InMemoryFormStore, dir: string): number {
  if (!fs.existsSync(dir)) {
    logger.warn("Forms directory not found", { dir });
    return 0;
  }

  let loaded = 0;
  for (const file of fs.readdirSync(dir)) {
    if (!file.endsWith(".json")) continue;
    try {
      const content = fs.readFileSync(path.join(dir, file), "utf-8");
      const seed = SeedFileSchema.parse(JSON.parse(content));
      const form = store.registerForm(seed.prompt, JSON.stringify(seed.schema, null, 2));
      logger.info("Registered form", { formId: form.id, file, kind: form.schema.kind });
      loaded += 1;
    } catch (err) {
      logger.error("Failed to load form", { file, error: errorMessage(err) });
    }
  }
  return loaded;
}
