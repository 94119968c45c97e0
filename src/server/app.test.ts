import type { Server } from "http";
import { afterEach, describe, expect, it } from "vitest";
import { parsePost } from "../content/post";
import { ContentBuildError, DuplicateSlugError } from "../errors";
import type { SiteMeta } from "../render/html";
import { buildSite } from "../render/site";
import { createPreviewApp } from "./app";
import type { SiteLoader } from "./app";

const site: SiteMeta = { title: "Dev Notes", baseUrl: "/", language: "en" };

const alpha = parsePost(
  [
    "+++",
    "date = 2024-05-01T10:00:00Z",
    'title = "Post alpha"',
    'tags = ["Kafka"]',
    'slug = "alpha"',
    'keywords = ["kafka"]',
    "+++",
    "Body of alpha.",
  ].join("\n"),
  "alpha.md",
);

const build = buildSite([alpha], { mode: "drafts", site });

describe("createPreviewApp", () => {
  let server: Server | undefined;

  const start = async (load: SiteLoader): Promise<string> => {
    const app = createPreviewApp(load);
    const listening = await new Promise<Server>((resolve) => {
      const instance = app.listen(0, "127.0.0.1", () => resolve(instance));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === "string") {
      throw new Error("preview app is not listening on a TCP port");
    }
    return `http://127.0.0.1:${address.port}`;
  };

  afterEach(async () => {
    const current = server;
    server = undefined;
    if (!current) {
      return;
    }
    current.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      current.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it("answers the health check", async () => {
    const base = await start(async () => build);
    const res = await fetch(`${base}/healthz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("lists post summaries", async () => {
    const base = await start(async () => build);
    const res = await fetch(`${base}/api/posts`);
    expect(await res.json()).toEqual([
      { slug: "alpha", title: "Post alpha", tags: ["Kafka"], draft: false, date: "2024-05-01T10:00:00.000Z" },
    ]);
  });

  it("returns one post by slug and 404 for an unknown one", async () => {
    const base = await start(async () => build);

    const found = await fetch(`${base}/api/posts/alpha`);
    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ slug: "alpha", title: "Post alpha" });

    const missing = await fetch(`${base}/api/posts/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ message: "Post not found" });
  });

  it("serves rendered pages and a JSON 404 for unknown paths", async () => {
    const base = await start(async () => build);

    const page = await fetch(`${base}/posts/alpha/`);
    expect(page.status).toBe(200);
    expect(page.headers.get("content-type")).toContain("text/html");
    expect(await page.text()).toContain("<h1>Post alpha</h1>");

    const missing = await fetch(`${base}/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ message: "No route for GET /nope" });
  });

  it("reports content errors with a 500", async () => {
    const base = await start(async () => {
      throw new ContentBuildError([new DuplicateSlugError("same", ["a.md", "b.md"])]);
    });

    const res = await fetch(`${base}/api/posts`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      message: "Site failed to build",
      errors: ["slug 'same' is used by more than one post: a.md, b.md"],
    });
  });
});
