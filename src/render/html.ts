import { marked } from "marked";
import type { Post } from "../content/post";
import { slugify } from "../utils";

export interface SiteMeta {
  title: string;
  baseUrl: string;
  language: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

// lexer + parser is marked's synchronous path.
export const renderMarkdown = (body: string): string => marked.parser(marked.lexer(body));

const withTrailingSlash = (url: string): string => (url.endsWith("/") ? url : `${url}/`);

export const postPath = (slug: string): string => `posts/${slug}/index.html`;
export const tagPath = (tag: string): string => `tags/${slugify(tag)}/index.html`;

export const postUrl = (site: SiteMeta, slug: string): string => `${withTrailingSlash(site.baseUrl)}posts/${slug}/`;
export const tagUrl = (site: SiteMeta, tag: string): string => `${withTrailingSlash(site.baseUrl)}tags/${slugify(tag)}/`;

const isoDay = (date: Date): string => date.toISOString().slice(0, 10);

interface LayoutInput {
  site: SiteMeta;
  title: string;
  meta?: Array<[name: string, content: string | undefined]>;
  canonical?: string;
  content: string;
}

const layout = ({ site, title, meta = [], canonical, content }: LayoutInput): string => {
  const fullTitle = title === site.title ? site.title : `${title} \u00b7 ${site.title}`;
  const head = [
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(fullTitle)}</title>`,
    ...meta
      .filter((entry): entry is [string, string] => Boolean(entry[1]))
      .map(([name, value]) => `<meta name="${escapeHtml(name)}" content="${escapeHtml(value)}">`),
    ...(canonical ? [`<link rel="canonical" href="${escapeHtml(canonical)}">`] : []),
  ];
  return [
    "<!doctype html>",
    `<html lang="${escapeHtml(site.language)}">`,
    "<head>",
    ...head,
    "</head>",
    "<body>",
    `<header><a href="${escapeHtml(withTrailingSlash(site.baseUrl))}">${escapeHtml(site.title)}</a></header>`,
    "<main>",
    content,
    "</main>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
};

export const renderPostPage = (post: Post, site: SiteMeta): string => {
  const tags = post.tags
    .map((tag) => `<li><a href="${escapeHtml(tagUrl(site, tag))}">${escapeHtml(tag)}</a></li>`)
    .join("");
  const content = [
    "<article>",
    `<h1>${escapeHtml(post.title)}</h1>`,
    ...(post.draft ? ['<p class="draft-notice">Draft</p>'] : []),
    `<p class="byline"><time datetime="${post.date.toISOString()}">${isoDay(post.date)}</time>${
      post.author ? ` by ${escapeHtml(post.author)}` : ""
    }</p>`,
    `<ul class="tags">${tags}</ul>`,
    renderMarkdown(post.body).trimEnd(),
    "</article>",
  ].join("\n");

  return layout({
    site,
    title: post.title,
    meta: [
      ["description", post.description || post.summary],
      ["keywords", post.keywords.join(", ")],
      ["author", post.author],
    ],
    canonical: postUrl(site, post.slug),
    content,
  });
};

const listingItem = (post: Post, site: SiteMeta): string =>
  [
    "<li>",
    `<a href="${escapeHtml(postUrl(site, post.slug))}">${escapeHtml(post.title)}</a>`,
    `<time datetime="${post.date.toISOString()}">${isoDay(post.date)}</time>`,
    ...(post.draft ? ['<span class="draft-notice">Draft</span>'] : []),
    ...(post.summary ? [`<p>${escapeHtml(post.summary)}</p>`] : []),
    "</li>",
  ].join("");

/** `posts` must already be in display order. */
export const renderListPage = (site: SiteMeta, heading: string, posts: Post[]): string => {
  const items = posts.length
    ? `<ul class="posts">\n${posts.map((post) => listingItem(post, site)).join("\n")}\n</ul>`
    : "<p>No posts yet.</p>";
  return layout({
    site,
    title: heading,
    content: `<h1>${escapeHtml(heading)}</h1>\n${items}`,
  });
};
