#!/usr/bin/env node

import path from "path";
import fsExtra from "fs-extra";
import { Command, InvalidOptionArgumentError } from "commander";
import pkg from "../package.json";
import { runBuild, loadContent } from "./build";
import { createLogger } from "./cli/ui";
import {
  buildDefaultConfig,
  configExists,
  DEFAULT_CONFIG_FILENAME,
  writeConfig,
} from "./config";
import { findPostBySlug, formatWarning } from "./content/loader";
import type { LoadedPost } from "./content/loader";
import { rewriteDraft } from "./content/post";
import { scaffoldPost } from "./content/scaffold";
import { describeErrors, isContentBuildError, isContentError } from "./errors";
import { buildSite, sortPosts } from "./render/site";
import type { BuildMode } from "./render/site";
import { createPreviewApp } from "./server/app";
import { withConfig } from "./site/context";
import type { BaseCommandOptions } from "./site/context";
import { getUserConfig } from "./user-config";

const program = new Command();
program
  .name("postpress")
  .description("Validate, lint, render and preview a markdown post collection")
  .version(pkg.version);

const parseInteger = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidOptionArgumentError("Not a number.");
  }
  return parsed;
};

const parseList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

const reportFailure = (error: unknown): void => {
  for (const line of describeErrors(error)) {
    console.error(`  ${line}`);
  }
  process.exitCode = 1;
};

interface BuildCommandOptions extends BaseCommandOptions {
  drafts?: boolean;
  out?: string;
}

interface CheckCommandOptions extends BaseCommandOptions {
  strict?: boolean;
}

interface NewCommandOptions extends BaseCommandOptions {
  title?: string;
  tags?: string[];
  author?: string;
}

interface ServeCommandOptions extends BaseCommandOptions {
  port?: number;
  published?: boolean;
}

program
  .command("init")
  .description(`Create a ${DEFAULT_CONFIG_FILENAME} config file in the current directory`)
  .option("-f, --force", "overwrite existing config file", false)
  .action(async (options: { force: boolean }) => {
    const targetDir = process.cwd();
    const configPath = path.join(targetDir, DEFAULT_CONFIG_FILENAME);

    if (await configExists(targetDir)) {
      if (!options.force) {
        console.error(`Config file already exists: ${configPath}`);
        console.error("Use --force to overwrite.");
        process.exitCode = 1;
        return;
      }
      console.log(`Overwriting existing config: ${configPath}`);
    }

    const config = buildDefaultConfig(targetDir);
    const writtenPath = await writeConfig(targetDir, config);
    console.log(`Created site config: ${writtenPath}`);
    console.log("");
    console.log("Edit the config file to customize:");
    console.log("  - Site title and base URL under 'site'");
    console.log("  - Where posts live under 'content.dir'");
    console.log("  - Where pages are written under 'output.dir'");
    console.log("");
    console.log("Create your first post with: postpress new <slug>");
  });

program
  .command("new")
  .description("Scaffold a draft post")
  .argument("<slug>", "URL slug of the post, also used as its file name")
  .option("--title <title>", "post title (defaults to the slug in title case)")
  .option("--tags <tags>", "comma-separated tags", parseList)
  .option("--author <author>", "post author (defaults to ~/.postpress/config.yml)")
  .option("--path <path>", "use the site configuration from a specific path")
  .option("-c, --config <file>", "config file to use instead of the nearest .postpress.yml")
  .action(async (slug: string, options: NewCommandOptions) => {
    const config = await withConfig(options);
    const userConfig = getUserConfig();
    const file = path.join(config.content.dir, `${slug}.md`);

    if (await fsExtra.pathExists(file)) {
      console.error(`Post already exists: ${file}`);
      process.exitCode = 1;
      return;
    }

    const source = scaffoldPost({
      slug,
      title: options.title,
      tags: options.tags ?? userConfig.tags,
      author: options.author ?? userConfig.author,
      date: new Date(),
    });
    await fsExtra.outputFile(file, source, "utf8");
    console.log(`Created draft: ${file}`);
    console.log(`Publish it with: postpress publish ${slug}`);
  });

program
  .command("check")
  .description("Validate front matter and lint markdown without writing output")
  .option("--strict", "treat warnings as errors", false)
  .option("-v, --verbose", "show detailed output instead of spinner", false)
  .option("--path <path>", "use the site configuration from a specific path")
  .option("-c, --config <file>", "config file to use instead of the nearest .postpress.yml")
  .action(async (options: CheckCommandOptions) => {
    const config = await withConfig(options);
    const logger = createLogger(Boolean(options.verbose));
    logger.start("Checking content...");

    try {
      const { posts, warnings } = await loadContent(config, logger);
      const drafts = posts.filter((post) => post.draft).length;
      const summary = `${posts.length} post(s), ${drafts} draft(s), ${warnings.length} warning(s)`;
      if (options.strict && warnings.length > 0) {
        logger.fail(`Check failed in strict mode: ${summary}`);
        process.exitCode = 1;
        return;
      }
      logger.succeed(`Content OK: ${summary}`);
    } catch (err) {
      if (!isContentBuildError(err) && !isContentError(err)) {
        logger.fail("Check failed");
        throw err;
      }
      logger.fail(err.message);
      reportFailure(err);
    }
  });

program
  .command("build")
  .description("Render the site into the output directory")
  .option("--drafts", "include drafts (preview build)", false)
  .option("-o, --out <dir>", "output directory (defaults to output.dir in config)")
  .option("-v, --verbose", "show detailed output instead of spinner", false)
  .option("--path <path>", "use the site configuration from a specific path")
  .option("-c, --config <file>", "config file to use instead of the nearest .postpress.yml")
  .action(async (options: BuildCommandOptions) => {
    const config = await withConfig(options);
    const mode: BuildMode = options.drafts ? "drafts" : "published";
    const logger = createLogger(Boolean(options.verbose));
    logger.start(`Building site (${mode})...`);

    try {
      const result = await runBuild(config, { mode, outDir: options.out, logger });
      const postPages = result.build.pages.filter((page) => page.kind === "post").length;
      logger.succeed(`Wrote ${result.written.length} file(s), ${postPages} post page(s), to ${result.outDir}`);
      if (result.removed.length > 0) {
        logger.info(`Removed ${result.removed.length} stale file(s) from the previous build`);
      }
    } catch (err) {
      if (!isContentBuildError(err) && !isContentError(err)) {
        logger.fail("Build failed");
        throw err;
      }
      logger.fail(err.message);
      reportFailure(err);
    }
  });

program
  .command("list")
  .description("List posts, newest first")
  .option("--drafts", "include drafts", false)
  .option("--path <path>", "use the site configuration from a specific path")
  .option("-c, --config <file>", "config file to use instead of the nearest .postpress.yml")
  .action(async (options: BuildCommandOptions) => {
    const config = await withConfig(options);
    const logger = createLogger(true);

    try {
      const { posts } = await loadContent(config, logger);
      const shown = sortPosts(posts).filter((post) => options.drafts || !post.draft);
      if (shown.length === 0) {
        console.log("No posts found.");
        return;
      }
      for (const post of shown) {
        const flag = post.draft ? " [draft]" : "";
        console.log(`${post.date.toISOString().slice(0, 10)}  ${post.slug}  ${post.title}${flag}`);
      }
    } catch (err) {
      if (!isContentBuildError(err) && !isContentError(err)) {
        throw err;
      }
      console.error(err.message);
      reportFailure(err);
    }
  });

program
  .command("publish")
  .description("Mark a draft post as published by setting draft = false")
  .argument("<slug>", "slug of the post to publish")
  .option("--path <path>", "use the site configuration from a specific path")
  .option("-c, --config <file>", "config file to use instead of the nearest .postpress.yml")
  .action(async (slug: string, options: BaseCommandOptions) => {
    const config = await withConfig(options);
    let found: LoadedPost | undefined;
    try {
      found = await findPostBySlug(config.content.dir, slug);
    } catch (err) {
      if (!isContentBuildError(err) && !isContentError(err)) {
        throw err;
      }
      console.error(err.message);
      reportFailure(err);
      return;
    }

    if (!found) {
      console.error(`No post with slug '${slug}' in ${config.content.dir}`);
      process.exitCode = 1;
      return;
    }

    if (!found.post.draft) {
      console.log(`'${slug}' is already published.`);
      return;
    }

    const file = path.join(config.content.dir, found.post.file);
    await fsExtra.writeFile(file, rewriteDraft(found.source, found.post.file, false), "utf8");
    console.log(`Published '${slug}' (${file})`);
    for (const warning of found.warnings) {
      console.warn(formatWarning(warning));
    }
  });

program
  .command("serve")
  .description("Serve a preview of the site, drafts included")
  .option("-p, --port <port>", "port to listen on", parseInteger)
  .option("--published", "hide drafts, as in a published build", false)
  .option("--path <path>", "use the site configuration from a specific path")
  .option("-c, --config <file>", "config file to use instead of the nearest .postpress.yml")
  .action(async (options: ServeCommandOptions) => {
    const config = await withConfig(options);
    const mode: BuildMode = options.published ? "published" : "drafts";
    const port = options.port ?? config.server.port;
    const logger = createLogger(true);

    const app = createPreviewApp(async () => {
      const { posts } = await loadContent(config, logger);
      return buildSite(posts, { mode, site: config.site });
    });

    app.listen(port, "127.0.0.1", () => {
      console.log(`Preview (${mode}) at http://localhost:${port}`);
    });
  });

program.configureHelp({
  sortSubcommands: true,
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
