import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

/**
 * tRPC router factory for creating nested route definitions.
 */
export const router = t.router;

/**
 * Procedure factory for every digest and status endpoint. Unexpected
 * failures are logged with the procedure path; client errors such as
 * NOT_FOUND pass through silently.
 */
export const publicProcedure = t.procedure.use(async ({ ctx, path, type, next }) => {
  const result = await next();
  if (!result.ok && result.error.code === "INTERNAL_SERVER_ERROR") {
    ctx.logger.error({ path, type, error: result.error.message }, "procedure failed");
  }
  return result;
});

/**
 * Calls procedures directly without HTTP transport; used by tests.
 */
export const createCallerFactory = t.createCallerFactory;
