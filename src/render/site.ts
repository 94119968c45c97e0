import type { Post, PostSummary } from "../content/post";
import { summarize } from "../content/post";
import { slugify, sortBy } from "../utils";
import { postPath, renderListPage, renderPostPage, tagPath } from "./html";
import type { SiteMeta } from "./html";

export type BuildMode = "published" | "drafts";

export type PageKind = "index" | "post" | "tag";

export interface RenderedPage {
  kind: PageKind;
  /** Output path relative to the output directory, always ending in index.html. */
  path: string;
  title: string;
  html: string;
  /** Post slug for post pages, tag segment for tag pages. */
  key?: string;
}

export interface TagListing {
  tag: string;
  segment: string;
  posts: PostSummary[];
}

export interface SiteBuild {
  mode: BuildMode;
  pages: RenderedPage[];
  posts: PostSummary[];
  tags: TagListing[];
  /** Drafts held back in published mode. */
  skipped: string[];
}

export interface BuildSiteOptions {
  mode: BuildMode;
  site: SiteMeta;
}

/** Newest first; posts sharing a timestamp fall back to slug order. */
export const sortPosts = (posts: Post[]): Post[] =>
  [...posts].sort((a, b) => b.date.getTime() - a.date.getTime() || a.slug.localeCompare(b.slug));

export const visiblePosts = (posts: Post[], mode: BuildMode): Post[] =>
  mode === "drafts" ? posts : posts.filter((post) => !post.draft);

const groupByTag = (posts: Post[]): Map<string, { tag: string; posts: Post[] }> => {
  const groups = new Map<string, { tag: string; posts: Post[] }>();
  for (const post of posts) {
    for (const tag of post.tags) {
      const segment = slugify(tag);
      const group = groups.get(segment) ?? { tag, posts: [] };
      group.posts.push(post);
      groups.set(segment, group);
    }
  }
  return groups;
};

export const buildSite = (posts: Post[], { mode, site }: BuildSiteOptions): SiteBuild => {
  const visible = sortPosts(visiblePosts(posts, mode));
  const skipped = posts.filter((post) => !visible.includes(post)).map((post) => post.slug);

  const pages: RenderedPage[] = [
    { kind: "index", path: "index.html", title: site.title, html: renderListPage(site, site.title, visible) },
  ];

  for (const post of visible) {
    pages.push({
      kind: "post",
      path: postPath(post.slug),
      title: post.title,
      html: renderPostPage(post, site),
      key: post.slug,
    });
  }

  const tags: TagListing[] = [];
  const groups = sortBy([...groupByTag(visible).entries()], ([segment]) => segment);
  for (const [segment, group] of groups) {
    const heading = `Posts tagged ${group.tag}`;
    pages.push({
      kind: "tag",
      path: tagPath(group.tag),
      title: heading,
      html: renderListPage(site, heading, group.posts),
      key: segment,
    });
    tags.push({ tag: group.tag, segment, posts: group.posts.map(summarize) });
  }

  return {
    mode,
    pages,
    posts: visible.map(summarize),
    tags,
    skipped: skipped.sort(),
  };
};

export const findPage = (build: SiteBuild, pagePath: string): RenderedPage | undefined => {
  const normalized = pagePath.replace(/^\/+/, "");
  const candidates = normalized === "" || normalized.endsWith("/")
    ? [`${normalized}index.html`]
    : [normalized, `${normalized}/index.html`];
  return build.pages.find((page) => candidates.includes(page.path));
};
