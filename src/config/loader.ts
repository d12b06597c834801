/**
 * Load `_config.yml` from a site root.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { DEPRECATED_TYPES, validateConfig, type SiteConfig } from "./schema.js";

export const CONFIG_FILENAMES = ["_config.yml", "_config.yaml"];

export interface LoadedConfig {
  config: Readonly<SiteConfig>;
  /** Absolute path of the file that was read, or null for in-memory text */
  source: string | null;
  /** Deprecation notices raised while normalising the config */
  warnings: string[];
}

/**
 * Parse and validate config text.
 * Duplicate keys are allowed; the last occurrence wins.
 */
export function parseConfig(text: string, source: string | null = null): LoadedConfig {
  let data: unknown;
  try {
    data = parseYaml(text, { uniqueKeys: false });
  } catch (e) {
    const where = source ?? "config";
    throw new Error(`Cannot parse ${where}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const result = validateConfig(data);
  if (!result.success) {
    throw new Error(`Invalid site config${source ? ` (${source})` : ""}: ${result.error}`);
  }

  const warnings: string[] = [];
  const config = result.data;
  config.defaults = config.defaults.map((rule, index) => {
    const type = rule.scope.type;
    if (type === undefined) return rule;
    const replacement = DEPRECATED_TYPES[type];
    if (!replacement) return rule;
    warnings.push(
      `defaults[${index}]: scope type "${type}" is deprecated, use "${replacement}"`
    );
    return { ...rule, scope: { ...rule.scope, type: replacement } };
  });

  return { config: Object.freeze(config), source, warnings };
}

/** Find and load the site config. Searches `_config.yml`, then `_config.yaml`. */
export function loadConfig(root: string, configPath?: string): LoadedConfig {
  const paths = configPath
    ? [resolve(root, configPath)]
    : CONFIG_FILENAMES.map((name) => resolve(root, name));

  for (const p of paths) {
    if (existsSync(p)) {
      return parseConfig(readFileSync(p, "utf-8"), p);
    }
  }

  throw new Error(
    `No site config found in ${resolve(root)}. Run \`postline init\` to create one.`
  );
}
