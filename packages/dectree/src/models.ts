import { readFileSync } from "node:fs";
import { z } from "zod";

const ModelListSchema = z.array(z.string());

let bundledModels: ReadonlySet<string> | undefined;

/** Decay model names shipped in `data/models.json` (read once). */
export function knownModels(): ReadonlySet<string> {
  if (!bundledModels) {
    const text = readFileSync(new URL("../data/models.json", import.meta.url), "utf8");
    bundledModels = new Set(ModelListSchema.parse(JSON.parse(text)));
  }
  return bundledModels;
}

/** Shape of a model name the bundled table does not list, e.g. "MY_MODEL" */
export const MODEL_NAME_PATTERN = /^[A-Z][A-Z0-9_]*$/;
