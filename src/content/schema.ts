import { TomlDate } from "smol-toml";
import { z } from "zod";
import { PostValidationError } from "../errors";
import type { FieldIssue } from "../errors";
import { slugify } from "../utils";

export const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export interface PostFrontMatter {
  date: Date;
  draft: boolean;
  title: string;
  tags: string[];
  summary?: string;
  slug: string;
  description?: string;
  keywords: string[];
  author?: string;
  /** Keys the schema does not know about, kept so a rewrite loses nothing. */
  params: Record<string, unknown>;
}

const timestamp = z.unknown().transform((value, ctx): Date => {
  if (value === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "is required" });
    return z.NEVER;
  }
  // A TOML local time has no date part.
  if ((!(value instanceof Date) && typeof value !== "string") || (value instanceof TomlDate && value.isTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a timestamp" });
    return z.NEVER;
  }
  const parsed = value instanceof Date ? value : new Date(value.trim());
  if (Number.isNaN(parsed.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${String(value)}' is not a valid timestamp` });
    return z.NEVER;
  }
  // TOML dates come back as a Date subclass that prints its source offset; keep a plain instant.
  return new Date(parsed.getTime());
});

const notBlank = (message: string) => z.string().refine((value) => value.trim().length > 0, message);

// Duplicates are judged by `key`: tags become URL segments, so two tags that
// slugify alike would share one listing page.
const uniqueList = (label: string, key: (item: string) => string) =>
  z
    .array(notBlank(`${label} entries must not be blank`), {
      invalid_type_error: `${label} must be a list of strings`,
    })
    .min(1, `${label} must contain at least one entry`)
    .superRefine((items, ctx) => {
      const seen = new Map<string, string>();
      for (const item of items) {
        if (item.trim() === "") {
          continue;
        }
        const id = key(item);
        if (id === "") {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${item}' has no letters or digits` });
          continue;
        }
        const previous = seen.get(id);
        if (previous !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate entry '${item}' (already listed as '${previous}')`,
          });
        } else {
          seen.set(id, item);
        }
      }
    });

export const frontMatterSchema = z
  .object({
    date: timestamp,
    draft: z.boolean({ invalid_type_error: "must be true or false" }).default(false),
    title: notBlank("must not be empty"),
    tags: uniqueList("tags", slugify),
    summary: z.string().optional(),
    slug: z.string().regex(SLUG_PATTERN, "must be lowercase letters, digits and single hyphens"),
    description: z.string().optional(),
    keywords: uniqueList("keywords", (item) => item.trim().toLowerCase()),
    author: z.string().optional(),
  })
  .passthrough();

const fieldOf = (path: (string | number)[]): string => {
  if (path.length === 0) {
    return "(front matter)";
  }
  return path.reduce<string>(
    (field, part) => (typeof part === "number" ? `${field}[${part}]` : field ? `${field}.${part}` : part),
    "",
  );
};

export const validateFrontMatter = (data: Record<string, unknown>, file: string): PostFrontMatter => {
  const result = frontMatterSchema.safeParse(data);
  if (!result.success) {
    const issues: FieldIssue[] = result.error.issues.map((issue) => ({
      file,
      field: fieldOf(issue.path),
      message:
        issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined" ? "is required" : issue.message,
    }));
    throw new PostValidationError(file, issues);
  }

  const { date, draft, title, tags, summary, slug, description, keywords, author, ...params } = result.data;
  return { date, draft, title, tags, summary, slug, description, keywords, author, params };
};
