import path from "path";
import { describe, expect, it } from "vitest";
import { loadPosts } from "../content/loader";
import { parsePost } from "../content/post";
import type { Post } from "../content/post";
import type { SiteMeta } from "./html";
import { buildSite, findPage, sortPosts } from "./site";

const site: SiteMeta = { title: "Dev Notes", baseUrl: "/", language: "en" };
const REPO_CONTENT = path.resolve(__dirname, "../../content/posts");
const KAFKA_SLUG = "custom-kafka-health-indicator-spring-boot";
const KAFKA_TITLE = "Writing a Custom Kafka Health Indicator in Spring Boot";

const makePost = (slug: string, date: string, tags: string[], draft = false): Post =>
  parsePost(
    [
      "+++",
      `date = "${date}"`,
      `draft = ${String(draft)}`,
      `title = "Post ${slug}"`,
      `tags = [${tags.map((tag) => `"${tag}"`).join(", ")}]`,
      `slug = "${slug}"`,
      'keywords = ["k"]',
      "+++",
      `Body of ${slug}.`,
    ].join("\n"),
    `${slug}.md`,
  );

describe("sortPosts", () => {
  it("orders newest first and breaks ties by slug", () => {
    const posts = [
      makePost("old", "2023-01-01T00:00:00Z", ["a"]),
      makePost("zeta", "2024-06-01T00:00:00Z", ["a"]),
      makePost("alpha", "2024-06-01T00:00:00Z", ["a"]),
    ];
    expect(sortPosts(posts).map((post) => post.slug)).toEqual(["alpha", "zeta", "old"]);
  });
});

describe("buildSite", () => {
  const posts = [
    makePost("first", "2024-01-01T00:00:00Z", ["Kafka", "Java"]),
    makePost("second", "2024-02-01T00:00:00Z", ["Kafka"]),
    makePost("hidden", "2024-03-01T00:00:00Z", ["Kafka", "Drafts"], true),
  ];

  it("leaves drafts out of a published build", () => {
    const build = buildSite(posts, { mode: "published", site });
    expect(build.posts.map((post) => post.slug)).toEqual(["second", "first"]);
    expect(build.skipped).toEqual(["hidden"]);
    expect(build.pages.map((page) => page.path)).toEqual([
      "index.html",
      "posts/second/index.html",
      "posts/first/index.html",
      "tags/java/index.html",
      "tags/kafka/index.html",
    ]);
    expect(build.pages.some((page) => page.html.includes("hidden"))).toBe(false);
  });

  it("includes drafts in a preview build", () => {
    const build = buildSite(posts, { mode: "drafts", site });
    expect(build.posts.map((post) => post.slug)).toEqual(["hidden", "second", "first"]);
    expect(build.skipped).toEqual([]);
    expect(build.tags.map((tag) => tag.segment)).toEqual(["drafts", "java", "kafka"]);
  });

  it("lists each tag's posts newest first", () => {
    const build = buildSite(posts, { mode: "published", site });
    const kafka = build.tags.find((tag) => tag.segment === "kafka");
    expect(kafka?.tag).toBe("Kafka");
    expect(kafka?.posts.map((post) => post.slug)).toEqual(["second", "first"]);
    const page = build.pages.find((item) => item.kind === "tag" && item.key === "kafka");
    expect(page?.title).toBe("Posts tagged Kafka");
  });

  it("still renders an index when nothing is published", () => {
    const build = buildSite(posts.slice(2), { mode: "published", site });
    expect(build.pages).toHaveLength(1);
    expect(build.pages[0]?.kind).toBe("index");
    expect(build.pages[0]?.html).toContain("<p>No posts yet.</p>");
  });
});

describe("repository post", () => {
  it("emits nothing for the draft post in a published build", async () => {
    const { posts } = await loadPosts(REPO_CONTENT, { normalizeEncoding: true });
    const build = buildSite(posts, { mode: "published", site });

    expect(build.pages.filter((page) => page.kind === "post")).toEqual([]);
    expect(build.pages.some((page) => page.html.includes(KAFKA_SLUG))).toBe(false);
    expect(build.skipped).toEqual([KAFKA_SLUG]);
  });

  it("emits exactly one page carrying the post title in a draft preview", async () => {
    const { posts } = await loadPosts(REPO_CONTENT, { normalizeEncoding: true });
    const build = buildSite(posts, { mode: "drafts", site });

    const pages = build.pages.filter((page) => page.kind === "post" && page.key === KAFKA_SLUG);
    expect(pages).toHaveLength(1);
    expect(pages[0]?.title).toBe(KAFKA_TITLE);
    expect(pages[0]?.path).toBe(`posts/${KAFKA_SLUG}/index.html`);
    expect(pages[0]?.html).toContain(`<h1>${KAFKA_TITLE}</h1>`);
    expect(pages[0]?.html).toContain("Spring Boot\u2019s actuator");
  });
});

describe("findPage", () => {
  const build = buildSite([makePost("alpha", "2024-01-01T00:00:00Z", ["Kafka"])], { mode: "published", site });

  it("resolves directory-style paths to index pages", () => {
    expect(findPage(build, "/")?.kind).toBe("index");
    expect(findPage(build, "/posts/alpha/")?.key).toBe("alpha");
    expect(findPage(build, "/posts/alpha")?.key).toBe("alpha");
    expect(findPage(build, "/tags/kafka/index.html")?.kind).toBe("tag");
  });

  it("returns undefined for unknown paths", () => {
    expect(findPage(build, "/posts/missing/")).toBeUndefined();
  });
});
