// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";
import { renderDigestHtml, renderIndexHtml } from "../digest/renderer";
import { parseTimedelta, sinceStartOfDay } from "../digest/timedelta";

const NOT_READY_RETRY_SECONDS = 30;
const DEFAULT_SINCE = "1w";

/**
 * Seconds until an aggregate generated at `generatedAt` reaches `maxAgeMs`,
 * floored at zero.
 */
export function remainingFreshness(generatedAt: Date, maxAgeMs: number, now: Date): number {
  const remainingMs = generatedAt.getTime() + maxAgeMs - now.getTime();
  return Math.max(0, Math.floor(remainingMs / 1000));
}

/**
 * Creates and configures an Express server serving rendered digests.
 *
 * - `GET /` lists digests; `GET /:digestId[?since=1w]` renders one from cache
 * - unknown digests are 404; digests never refreshed yet are 503 with
 *   `Retry-After`, never an empty page
 * - `POST /:digestId/refresh` refreshes on demand, then redirects to the page
 * - the tRPC router is mounted at `/api/trpc`, `/health` for health checks
 *
 * @param context - Digests, cache, scheduler, budget, config and logger
 * @returns Configured Express app instance (not started — caller decides port)
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();
  const now = context.now ?? (() => new Date());
  const byId = new Map(context.digests.map((digest) => [digest.id, digest]));
  const maxAgeMs = context.config.refresh.maxAgeMinutes * 60_000;

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (_req, res) => {
    const html = renderIndexHtml({
      digests: context.digests.map((digest) => {
        const aggregate = context.cache.get(digest.id);
        return {
          id: digest.id,
          title: digest.title,
          generatedAt: aggregate?.generatedAt ?? null,
          failureCount: aggregate?.failures.length ?? 0,
        };
      }),
      rateLimit: context.budget.snapshot(),
      defaultSince: DEFAULT_SINCE,
    });
    res.type("html").send(html);
  });

  app.get("/:digestId", (req, res) => {
    const digest = byId.get(req.params.digestId);
    if (!digest) {
      res.status(404).type("text").send("unknown digest");
      return;
    }

    const current = now();
    let since: Date | null = null;
    const rawSince = req.query["since"];
    if (rawSince !== undefined) {
      const deltaMs = typeof rawSince === "string" ? parseTimedelta(rawSince) : null;
      if (deltaMs === null) {
        res.status(400).type("text").send("invalid since value");
        return;
      }
      since = sinceStartOfDay(current, deltaMs);
    }

    const aggregate = context.cache.get(digest.id);
    if (!aggregate) {
      res
        .status(503)
        .set("Retry-After", String(NOT_READY_RETRY_SECONDS))
        .set("Cache-Control", "no-store")
        .type("text")
        .send("digest not ready");
      return;
    }

    const html = renderDigestHtml({
      aggregate,
      items: digest.items,
      since,
      indexUrl: "/",
    });

    res
      .set(
        "Cache-Control",
        `public, max-age=${remainingFreshness(aggregate.generatedAt, maxAgeMs, current)}`,
      )
      .set("Last-Modified", aggregate.generatedAt.toUTCString())
      .type("html")
      .send(html);
  });

  app.post("/:digestId/refresh", (req, res, next) => {
    const digest = byId.get(req.params.digestId);
    if (!digest) {
      res.status(404).type("text").send("unknown digest");
      return;
    }

    context.scheduler
      .requestRefresh(digest.id, { timeoutMs: context.config.refresh.onDemandTimeoutMs })
      .then((aggregate) => {
        if (!aggregate) {
          res
            .status(503)
            .set("Retry-After", String(NOT_READY_RETRY_SECONDS))
            .type("text")
            .send("digest not ready");
          return;
        }
        res.redirect(303, `/${encodeURIComponent(digest.id)}`);
      })
      .catch(next);
  });

  return app;
}
