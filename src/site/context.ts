import path from "path";
import type { ResolvedSiteConfig } from "../config";
import { DEFAULT_CONFIG_FILENAME, findSiteDir, loadConfig, resolveConfig } from "../config";

export interface BaseCommandOptions {
  config?: string;
  path?: string;
  verbose?: boolean;
  [key: string]: unknown;
}

/**
 * Loads the nearest site config. Without one, the starting directory is used
 * with default settings.
 */
export const withConfig = async (options: BaseCommandOptions = {}): Promise<ResolvedSiteConfig> => {
  const configFilename = options.config || DEFAULT_CONFIG_FILENAME;
  const startDir = options.path ? path.resolve(options.path) : process.cwd();

  if (options.config) {
    const configPath = path.resolve(startDir, configFilename);
    const configDir = path.dirname(configPath);
    const raw = await loadConfig(configDir, path.basename(configPath));
    return resolveConfig(raw, configDir, { configFile: configPath });
  }

  const siteDir = await findSiteDir({ path: startDir });

  if (!siteDir) {
    if (options.verbose) {
      console.log(`No ${DEFAULT_CONFIG_FILENAME} found from ${startDir}; using defaults.`);
    }
    return resolveConfig({}, startDir);
  }

  const raw = await loadConfig(siteDir, configFilename);
  const resolved = resolveConfig(raw, siteDir, { configFile: path.join(siteDir, configFilename) });

  if (options.verbose) {
    console.log("\n=== Configuration ===");
    console.log(`Config file: ${resolved.paths.configFile}`);
    console.log(JSON.stringify(raw, null, 2));
    console.log(`Content: ${resolved.content.dir}`);
    console.log(`Output: ${resolved.output.dir}`);
    console.log("=== End Configuration ===\n");
  }

  return resolved;
};
