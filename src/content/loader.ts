import path from "path";
import fsExtra from "fs-extra";
import { ContentBuildError, DuplicateSlugError, isContentError } from "../errors";
import type { ContentError } from "../errors";
import { listMarkdownFiles } from "../utils";
import { findEncodingAnomalies, repairEncoding } from "./encoding";
import { lintMarkdown } from "./lint";
import type { MarkdownRule } from "./lint";
import { parsePost } from "./post";
import type { Post } from "./post";

export type WarningRule = "encoding" | MarkdownRule;

export interface ContentWarning {
  file: string;
  line: number;
  rule: WarningRule;
  message: string;
}

export interface LoadOptions {
  /** Repair mis-decoded characters before parsing. The file on disk is untouched. */
  normalizeEncoding?: boolean;
}

export interface LoadResult {
  posts: Post[];
  warnings: ContentWarning[];
}

export interface LoadedPost {
  post: Post;
  source: string;
  warnings: ContentWarning[];
}

export const formatWarning = (warning: ContentWarning): string =>
  `${warning.file}:${warning.line}: ${warning.message} [${warning.rule}]`;

export const inspectSource = (source: string, file: string, bodyLine: number, body: string): ContentWarning[] => {
  const encoding = findEncodingAnomalies(source).map<ContentWarning>((anomaly) => ({
    file,
    line: anomaly.line,
    rule: "encoding",
    message: `'${anomaly.broken}' looks like a mis-decoded '${anomaly.repaired}'`,
  }));
  const markdown = lintMarkdown(body).map<ContentWarning>((issue) => ({
    file,
    line: issue.line + bodyLine - 1,
    rule: issue.rule,
    message: issue.message,
  }));
  return [...encoding, ...markdown].sort((a, b) => a.line - b.line);
};

export const readPost = async (contentDir: string, file: string, options: LoadOptions = {}): Promise<LoadedPost> => {
  const source = await fsExtra.readFile(path.join(contentDir, file), "utf8");
  const post = parsePost(options.normalizeEncoding ? repairEncoding(source) : source, file);
  return { post, source, warnings: inspectSource(source, file, post.bodyLine, post.body) };
};

export const findDuplicateSlugs = (posts: Post[]): DuplicateSlugError[] => {
  const bySlug = new Map<string, string[]>();
  for (const post of posts) {
    bySlug.set(post.slug, [...(bySlug.get(post.slug) ?? []), post.file]);
  }
  return [...bySlug.entries()]
    .filter(([, files]) => files.length > 1)
    .map(([slug, files]) => new DuplicateSlugError(slug, files));
};

/**
 * Reads every markdown file below `contentDir`. All failures are collected
 * and thrown together, so a broken post is never silently dropped.
 */
export const loadPosts = async (contentDir: string, options: LoadOptions = {}): Promise<LoadResult> => {
  if (!(await fsExtra.pathExists(contentDir))) {
    throw new Error(`Content directory not found: ${contentDir}`);
  }

  const files = await listMarkdownFiles(contentDir);
  const errors: ContentError[] = [];

  const results = await Promise.all(
    files.map(async (file) => {
      try {
        return await readPost(contentDir, file, options);
      } catch (error) {
        if (isContentError(error)) {
          errors.push(error);
          return null;
        }
        throw error;
      }
    }),
  );

  const loaded = results.filter((result): result is LoadedPost => result !== null);
  const posts = loaded.map((result) => result.post);
  errors.push(...findDuplicateSlugs(posts));

  if (errors.length > 0) {
    errors.sort((a, b) => a.file.localeCompare(b.file));
    throw new ContentBuildError(errors);
  }

  return {
    posts,
    warnings: loaded.flatMap((result) => result.warnings),
  };
};

export const findPostBySlug = async (
  contentDir: string,
  slug: string,
  options: LoadOptions = {},
): Promise<LoadedPost | undefined> => {
  const files = await listMarkdownFiles(contentDir);
  const matches: LoadedPost[] = [];
  const errors: ContentError[] = [];

  for (const file of files) {
    try {
      const loaded = await readPost(contentDir, file, options);
      if (loaded.post.slug === slug) {
        matches.push(loaded);
      }
    } catch (error) {
      if (!isContentError(error)) {
        throw error;
      }
      errors.push(error);
    }
  }

  if (matches.length > 1) {
    throw new DuplicateSlugError(slug, matches.map((match) => match.post.file));
  }
  // A broken file may be the one asked for; report why it could not be read.
  if (matches.length === 0 && errors.length > 0) {
    throw new ContentBuildError(errors);
  }
  return matches[0];
};
