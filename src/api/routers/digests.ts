// pattern: Imperative Shell
import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { router, publicProcedure } from "../trpc";
import type { AppContext } from "../context";
import type { DigestConfig } from "../../pipeline/types";

function findDigest(ctx: AppContext, id: string): DigestConfig {
  const digest = ctx.digests.find((candidate) => candidate.id === id);
  if (!digest) {
    throw new TRPCError({ code: "NOT_FOUND", message: `unknown digest: ${id}` });
  }
  return digest;
}

/**
 * Summary of a digest's cached state, without its events.
 */
export function summarizeDigest(ctx: AppContext, digest: DigestConfig) {
  const aggregate = ctx.cache.get(digest.id);
  return {
    id: digest.id,
    title: digest.title,
    itemCount: digest.items.length,
    state: ctx.scheduler.state(digest.id),
    generatedAt: aggregate?.generatedAt ?? null,
    eventCount: aggregate?.events.length ?? 0,
    failedItems: aggregate?.failures.map((failure) => failure.item.url) ?? [],
    stale: ctx.cache.isStale(digest.id, ctx.config.refresh.maxAgeMinutes * 60_000),
  };
}

export const digestsRouter = router({
  list: publicProcedure.query(({ ctx }) => {
    return ctx.digests.map((digest) => summarizeDigest(ctx, digest));
  }),

  get: publicProcedure
    .input(z.object({ id: z.string().min(1) }))
    .query(({ ctx, input }) => {
      const digest = findDigest(ctx, input.id);
      return {
        ...summarizeDigest(ctx, digest),
        aggregate: ctx.cache.get(digest.id),
      };
    }),

  refresh: publicProcedure
    .input(
      z.object({
        id: z.string().min(1),
        timeoutMs: z.number().int().positive().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      const digest = findDigest(ctx, input.id);
      const aggregate = await ctx.scheduler.requestRefresh(digest.id, {
        timeoutMs: input.timeoutMs ?? ctx.config.refresh.onDemandTimeoutMs,
      });
      return {
        ...summarizeDigest(ctx, digest),
        ready: aggregate !== null,
      };
    }),
});
