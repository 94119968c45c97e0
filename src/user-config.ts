import fs from "fs";
import path from "path";
import os from "os";
import { parse as parseYaml } from "yaml";

export const USER_CONFIG_PATH = path.join(os.homedir(), ".postpress", "config.yml");

interface UserConfig {
  author?: unknown;
  tags?: unknown;
}

export interface ValidatedUserConfig {
  /** Default `author` for new posts. */
  author?: string;
  /** Tags new posts start with. */
  tags: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const validateUserConfig = (config: UserConfig, configPath: string): ValidatedUserConfig => {
  const validated: ValidatedUserConfig = { tags: [] };

  if (config.author !== undefined) {
    if (typeof config.author === "string" && config.author.trim() !== "") {
      validated.author = config.author.trim();
    } else {
      console.warn(`Warning: ignoring 'author' in ${configPath}; expected a non-empty string`);
    }
  }

  if (config.tags !== undefined) {
    if (Array.isArray(config.tags) && config.tags.every((tag) => typeof tag === "string")) {
      validated.tags = config.tags.filter((tag): tag is string => typeof tag === "string");
    } else {
      console.warn(`Warning: ignoring 'tags' in ${configPath}; expected a list of strings`);
    }
  }

  return validated;
};

export const getUserConfig = (configPath: string = USER_CONFIG_PATH): ValidatedUserConfig => {
  if (!fs.existsSync(configPath)) {
    return { tags: [] };
  }

  try {
    const content = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(content);
    const config: UserConfig = isRecord(parsed) ? { author: parsed.author, tags: parsed.tags } : {};
    return validateUserConfig(config, configPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Warning: Failed to parse user config at ${configPath}: ${message}`);
    return { tags: [] };
  }
};
