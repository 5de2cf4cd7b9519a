/**
 * HTTP Server
 * Express routes for the home page and domain reports
 */

import express from "express";
import type { Express, Response } from "express";
import type { Server } from "http";
import { SiteService } from "./service";
import type { RenderedPage, SiteContext } from "../types";

function send(res: Response, page: RenderedPage): void {
  res.status(page.status).type("html").send(page.html);
}

/**
 * Create the Express application for a site context
 */
export function createApp(ctx: SiteContext): Express {
  const app = express();
  const site = new SiteService(ctx);
  const { logger } = ctx;

  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: false }));

  // Request timing
  app.use((req, res, next) => {
    const startedAt = performance.now();
    res.locals.startedAt = startedAt;
    res.on("finish", () => {
      const ms = Math.round(performance.now() - startedAt);
      logger.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${ms}ms`);
    });
    next();
  });

  app.get("/", (_req, res) => {
    send(res, site.renderHome());
  });

  app.post("/", (req, res) => {
    const body: unknown = req.body;
    const domain =
      typeof body === "object" && body !== null && "domain" in body
        ? body.domain
        : undefined;
    const target = typeof domain === "string" ? site.redirectTarget(domain) : null;

    if (target === null) {
      res.status(400).type("text").send("Missing domain");
      return;
    }
    res.redirect(target);
  });

  app.get("/domain/:domain", (req, res, next) => {
    const startedAt =
      typeof res.locals.startedAt === "number"
        ? res.locals.startedAt
        : performance.now();
    site
      .renderDomain(req.params.domain, startedAt)
      .then((page) => send(res, page))
      .catch(next);
  });

  return app;
}

/**
 * Start listening on the configured address
 */
export function startServer(ctx: SiteContext): Promise<Server> {
  const { host, port } = ctx.config.server;
  const app = createApp(ctx);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      ctx.logger.info(`Listening on http://${host}:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
