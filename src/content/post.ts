import { parseFrontMatter, stringifyFrontMatter } from "./frontmatter";
import type { FrontMatterFormat } from "./frontmatter";
import { validateFrontMatter } from "./schema";
import type { PostFrontMatter } from "./schema";

export type { PostFrontMatter };

export interface Post extends PostFrontMatter {
  /** Path of the source file, relative to the content directory. */
  file: string;
  format: FrontMatterFormat | null;
  body: string;
  /** 1-based line in the source file where the body starts. */
  bodyLine: number;
}

export type PostSummary = Pick<Post, "slug" | "title" | "summary" | "author" | "tags" | "draft"> & {
  date: string;
};

const countLines = (text: string): number => (text.match(/\n/g) ?? []).length;

export const parsePost = (source: string, file: string): Post => {
  const { format, data, body } = parseFrontMatter(source, file);
  const frontMatter = validateFrontMatter(data, file);
  const bodyLine = countLines(source.slice(0, source.length - body.length)) + 1;
  return { ...frontMatter, file, format, body, bodyLine };
};

/** Field order follows the order authors write them in. */
export const frontMatterOf = (post: PostFrontMatter): Record<string, unknown> => ({
  date: post.date,
  draft: post.draft,
  title: post.title,
  tags: post.tags,
  summary: post.summary,
  slug: post.slug,
  description: post.description,
  keywords: post.keywords,
  author: post.author,
  ...post.params,
});

export const serializePost = (post: Pick<Post, keyof PostFrontMatter | "body">): string =>
  `${stringifyFrontMatter(frontMatterOf(post))}${post.body}`;

export const setDraft = <T extends Post>(post: T, draft: boolean): T => ({ ...post, draft });

export const summarize = (post: Post): PostSummary => ({
  slug: post.slug,
  title: post.title,
  summary: post.summary,
  author: post.author,
  tags: [...post.tags],
  draft: post.draft,
  date: post.date.toISOString(),
});

const DRAFT_LINE = /^([ \t]*draft[ \t]*=[ \t]*)(true|false)([ \t]*(?:#.*)?)$/m;
const TABLE_HEADER = /^[ \t]*\[/m;

/**
 * Changes the draft flag in a TOML source with a one-line edit, keeping the
 * author's formatting and comments. Other sources are re-serialized.
 */
export const rewriteDraft = (source: string, file: string, draft: boolean): string => {
  const post = parsePost(source, file);
  if (post.format === "toml") {
    const head = source.slice(0, source.length - post.body.length);
    // Only top-level keys: anything after a [table] header belongs to that table.
    const tableStart = head.search(TABLE_HEADER);
    const topLevel = tableStart === -1 ? head : head.slice(0, tableStart);
    if (DRAFT_LINE.test(topLevel)) {
      const edited = topLevel.replace(
        DRAFT_LINE,
        (_line: string, prefix: string, _value: string, suffix: string) => `${prefix}${String(draft)}${suffix}`,
      );
      return `${edited}${head.slice(topLevel.length)}${post.body}`;
    }
  }
  return serializePost(setDraft(post, draft));
};
