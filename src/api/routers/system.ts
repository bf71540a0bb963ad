// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const refreshing = ctx.digests
      .filter((digest) => ctx.scheduler.state(digest.id) === "refreshing")
      .map((digest) => digest.id);

    const ready = ctx.digests.filter((digest) => ctx.cache.get(digest.id) !== null).length;

    return {
      digestCount: ctx.digests.length,
      readyCount: ready,
      refreshing,
      refreshCron: ctx.config.schedule.refresh,
      maxAgeMinutes: ctx.config.refresh.maxAgeMinutes,
      rateLimit: ctx.budget.snapshot(),
    };
  }),
});
