import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import type { ConfigLayer } from "./index.js";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Read a YAML configuration layer.
 *
 * A missing optional file yields null; a missing required file, unreadable
 * YAML or a top-level value that is not a mapping all throw.
 */
export async function readConfigFile(path: string, options: { required: boolean }): Promise<ConfigLayer | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (!options.required && isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw new Error(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content, { schema: yaml.JSON_SCHEMA });
  } catch (err) {
    throw new Error(`Config file ${path} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (raw === undefined || raw === null) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`Config file ${path} must contain a mapping at the top level`);
  }
  return Object.fromEntries(Object.entries(raw));
}
