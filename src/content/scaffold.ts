import { serializePost } from "./post";
import { SLUG_PATTERN } from "./schema";

export interface ScaffoldInput {
  slug: string;
  title?: string;
  tags: string[];
  author?: string;
  date: Date;
}

export const titleFromSlug = (slug: string): string =>
  slug
    .split("-")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");

export const scaffoldPost = ({ slug, title, tags, author, date }: ScaffoldInput): string => {
  if (!SLUG_PATTERN.test(slug)) {
    throw new Error(`Invalid slug '${slug}': use lowercase letters, digits and single hyphens`);
  }
  const postTags = tags.length > 0 ? tags : ["uncategorized"];
  const postTitle = title?.trim() || titleFromSlug(slug);

  return serializePost({
    date,
    draft: true,
    title: postTitle,
    tags: postTags,
    summary: "",
    slug,
    description: "",
    keywords: postTags.map((tag) => tag.toLowerCase()),
    author,
    params: {},
    body: `\n## Introduction\n\nWrite the opening of "${postTitle}" here.\n`,
  });
};
