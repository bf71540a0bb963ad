// pattern: Imperative Shell
import { router } from "./trpc";
import { digestsRouter } from "./routers/digests";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: digest listing, lookup and on-demand refresh, plus
 * service status.
 */
export const appRouter = router({
  digests: digestsRouter,
  system: systemRouter,
});

/**
 * Inferred type of the root tRPC router.
 * Used for type-safe client code generation and caller factory typing.
 */
export type AppRouter = typeof appRouter;
