import path from "path";
import fsExtra from "fs-extra";
import type { Logger } from "./cli/ui";
import type { ResolvedSiteConfig } from "./config";
import { formatWarning, loadPosts } from "./content/loader";
import type { ContentWarning, LoadResult } from "./content/loader";
import { buildSite } from "./render/site";
import type { BuildMode, SiteBuild } from "./render/site";
import { withOutputSession } from "./state";
import { writeJson, writeText } from "./utils";

export interface BuildOptions {
  mode: BuildMode;
  outDir?: string;
  logger: Logger;
  now?: () => Date;
}

export interface BuildResult {
  outDir: string;
  build: SiteBuild;
  warnings: ContentWarning[];
  written: string[];
  removed: string[];
}

export const POSTS_INDEX_FILE = "posts.json";

export const loadContent = async (config: ResolvedSiteConfig, logger: Logger): Promise<LoadResult> => {
  logger.update(`Reading posts from ${config.content.dir}...`);
  const result = await loadPosts(config.content.dir, { normalizeEncoding: config.encoding.normalize });
  for (const warning of result.warnings) {
    logger.warn(formatWarning(warning));
  }
  return result;
};

const removeEmptyParents = async (outDir: string, file: string): Promise<void> => {
  let dir = path.dirname(path.join(outDir, file));
  while (dir.startsWith(`${outDir}${path.sep}`)) {
    if (!(await fsExtra.pathExists(dir))) {
      dir = path.dirname(dir);
      continue;
    }
    const entries = await fsExtra.readdir(dir);
    if (entries.length > 0) {
      return;
    }
    await fsExtra.remove(dir);
    dir = path.dirname(dir);
  }
};

/**
 * Loads, renders and writes the site. Files written by the previous build
 * into the same directory and not produced by this one are deleted, so a post
 * moved back to draft leaves no page behind.
 */
export const runBuild = async (config: ResolvedSiteConfig, options: BuildOptions): Promise<BuildResult> => {
  const { logger, mode } = options;
  const outDir = path.resolve(options.outDir ?? config.output.dir);
  const now = options.now ?? (() => new Date());

  const { posts, warnings } = await loadContent(config, logger);

  logger.update(`Rendering ${posts.length} post(s) in ${mode} mode...`);
  const build = buildSite(posts, { mode, site: config.site });

  return withOutputSession(config.output.manifest, outDir, async (session) => {
    const written: string[] = [];
    for (const page of build.pages) {
      await writeText(path.join(outDir, page.path), page.html);
      written.push(page.path);
    }
    await writeJson(path.join(outDir, POSTS_INDEX_FILE), build.posts);
    written.push(POSTS_INDEX_FILE);

    const removed = await session.commit({ builtAt: now().toISOString(), mode, files: written });
    for (const file of removed) {
      await fsExtra.remove(path.join(outDir, file));
      await removeEmptyParents(outDir, file);
    }

    if (build.skipped.length > 0) {
      logger.info(`Skipped ${build.skipped.length} draft(s): ${build.skipped.join(", ")}`);
    }

    return { outDir, build, warnings, written, removed };
  });
};
