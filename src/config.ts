import path from "path";
import os from "os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import fsExtra from "fs-extra";
import type { SiteMeta } from "./render/html";
import { runCommand } from "./utils";

export const DEFAULT_CONFIG_FILENAME = ".postpress.yml";
export const DEFAULT_PORT = 4173;
export const MANIFEST_DIRNAME = ".postpress";

export interface SiteConfig {
  site?: {
    title?: string;
    baseUrl?: string;
    language?: string;
  };
  content?: {
    dir?: string;
  };
  output?: {
    dir?: string;
  };
  encoding?: {
    normalize?: boolean;
  };
  server?: {
    port?: number;
  };
  [key: string]: unknown;
}

export type RawSiteConfig = Record<string, unknown>;

export interface ResolvedSiteConfig {
  raw: RawSiteConfig;
  paths: {
    configDir: string;
    configFile: string | null;
  };
  site: SiteMeta;
  content: {
    dir: string;
  };
  output: {
    dir: string;
    manifest: string;
  };
  encoding: {
    normalize: boolean;
  };
  server: {
    port: number;
  };
}

export interface ResolveOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  warn?: (message: string) => void;
}

interface FindSiteOptions {
  path?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

export const discoverRepoRoot = async (cwd: string = process.cwd()): Promise<string> => {
  try {
    const { stdout } = await runCommand("git", ["rev-parse", "--show-toplevel"], {
      cwd,
    });
    return stdout || cwd;
  } catch {
    return cwd;
  }
};

/**
 * Walks up from the start directory looking for a config file, stopping at
 * the repository root or the home directory. Returns null when none is found.
 */
export const findSiteDir = async (options: FindSiteOptions = {}): Promise<string | null> => {
  const startDir = options.path ? path.resolve(options.path) : process.cwd();
  const repoRoot = await discoverRepoRoot(startDir);
  const homeDir = os.homedir();

  let currentDir = startDir;

  while (true) {
    const configPath = path.join(currentDir, DEFAULT_CONFIG_FILENAME);
    if (await fsExtra.pathExists(configPath)) {
      return currentDir;
    }

    if (currentDir === repoRoot || currentDir === homeDir) {
      break;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
};

export const buildDefaultConfig = (configDir: string): SiteConfig => ({
  site: {
    title: path.basename(configDir),
    baseUrl: "/",
    language: "en",
  },
  content: {
    dir: "content/posts",
  },
  output: {
    dir: "public",
  },
  encoding: {
    normalize: true,
  },
  server: {
    port: DEFAULT_PORT,
  },
});

export const configExists = async (
  configDir: string,
  filename: string = DEFAULT_CONFIG_FILENAME,
): Promise<boolean> => fsExtra.pathExists(path.join(configDir, filename));

export const writeConfig = async (
  configDir: string,
  config: SiteConfig,
  options: { filename?: string } = {},
): Promise<string> => {
  const configPath = path.join(configDir, options.filename || DEFAULT_CONFIG_FILENAME);
  const yamlContents = stringifyYaml(config, { indent: 2 });
  await fsExtra.writeFile(configPath, yamlContents, "utf8");
  return configPath;
};

export const loadConfig = async (
  configDir: string,
  filename: string = DEFAULT_CONFIG_FILENAME,
): Promise<RawSiteConfig> => {
  const configPath = path.join(configDir, filename);
  const contents = await fsExtra.readFile(configPath, "utf8");
  const parsed: unknown = parseYaml(contents);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid configuration in ${configPath}: expected a mapping at the top level`);
  }
  return parsed;
};

const parsePort = (value: unknown): number | undefined => {
  const port = typeof value === "string" ? Number.parseInt(value, 10) : value;
  if (typeof port === "number" && Number.isInteger(port) && port > 0 && port < 65536) {
    return port;
  }
  return undefined;
};

const sectionOf = (config: RawSiteConfig, name: string, warn: (message: string) => void): Record<string, unknown> => {
  const value = config[name];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    warn(`Warning: ignoring '${name}' in config; expected a mapping`);
    return {};
  }
  return value;
};

export const resolveConfig = (
  config: RawSiteConfig,
  configDir: string,
  { configFile, env = process.env, warn = console.warn }: ResolveOptions = {},
): ResolvedSiteConfig => {
  const siteSection = sectionOf(config, "site", warn);
  const encodingSection = sectionOf(config, "encoding", warn);
  const serverSection = sectionOf(config, "server", warn);

  const pickString = (section: string, key: string, value: unknown, fallback: string): string => {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value === "string" && value.trim() !== "") {
      return value;
    }
    warn(`Warning: ignoring ${section}.${key} in config; expected a non-empty string`);
    return fallback;
  };

  const site: SiteMeta = {
    title: pickString("site", "title", siteSection.title, path.basename(configDir)),
    baseUrl: pickString("site", "baseUrl", siteSection.baseUrl, "/"),
    language: pickString("site", "language", siteSection.language, "en"),
  };

  const contentSetting = sectionOf(config, "content", warn).dir;
  const outputSetting = sectionOf(config, "output", warn).dir;
  const contentDir = path.resolve(configDir, pickString("content", "dir", contentSetting, "content/posts"));
  const outputDir = path.resolve(configDir, pickString("output", "dir", outputSetting, "public"));

  let normalize = true;
  if (typeof encodingSection.normalize === "boolean") {
    normalize = encodingSection.normalize;
  } else if (encodingSection.normalize !== undefined) {
    warn("Warning: ignoring encoding.normalize in config; expected true or false");
  }

  let port = DEFAULT_PORT;
  if (serverSection.port !== undefined) {
    const configured = parsePort(serverSection.port);
    if (configured === undefined) {
      warn(`Warning: ignoring server.port in config; '${String(serverSection.port)}' is not a valid port`);
    } else {
      port = configured;
    }
  }
  if (env.POSTPRESS_PORT !== undefined) {
    const fromEnv = parsePort(env.POSTPRESS_PORT);
    if (fromEnv === undefined) {
      warn(`Warning: ignoring POSTPRESS_PORT; '${env.POSTPRESS_PORT}' is not a valid port`);
    } else {
      port = fromEnv;
    }
  }

  return {
    raw: config,
    paths: {
      configDir,
      configFile: configFile ?? null,
    },
    site,
    content: {
      dir: contentDir,
    },
    output: {
      dir: outputDir,
      manifest: path.join(configDir, MANIFEST_DIRNAME, "manifest.json"),
    },
    encoding: {
      normalize,
    },
    server: {
      port,
    },
  };
};
