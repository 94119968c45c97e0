import express from "express";
import type { NextFunction, Request, Response } from "express";
import { describeErrors } from "../errors";
import { findPage } from "../render/site";
import type { SiteBuild } from "../render/site";

export type SiteLoader = () => Promise<SiteBuild>;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const wrap =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

/**
 * Preview app. The site is rebuilt through `load` on every request, so edits
 * to content show up on reload.
 */
export const createPreviewApp = (load: SiteLoader): express.Express => {
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.get(
    "/api/posts",
    wrap(async (_req, res) => {
      const build = await load();
      res.json(build.posts);
    }),
  );

  app.get(
    "/api/posts/:slug",
    wrap(async (req, res) => {
      const build = await load();
      const post = build.posts.find((item) => item.slug === req.params.slug);

      if (!post) {
        res.status(404).json({ message: "Post not found" });
        return;
      }

      res.json(post);
    }),
  );

  app.get(
    "*",
    wrap(async (req, res) => {
      const build = await load();
      const page = findPage(build, req.path);

      if (!page) {
        res.status(404).json({ message: `No route for ${req.method} ${req.path}` });
        return;
      }

      res.type("html").send(page.html);
    }),
  );

  app.use((req, res) => {
    res.status(404).json({ message: `No route for ${req.method} ${req.path}` });
  });

  // Express recognises error handlers by their four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    res.status(500).json({ message: "Site failed to build", errors: describeErrors(err) });
  });

  return app;
};
