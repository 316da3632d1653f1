import { TRPCError } from "@trpc/server";
import { publicProcedure, router } from "./_core/trpc";
import { logger } from "./_core/logger";
import { BindError, NotConfiguredError, ProxyStateError } from "./proxy/errors";
import { SettingsError, settingsPatchSchema, toSettingsView } from "./settings";

/** Maps proxy and settings failures onto tRPC error codes. */
async function guard<T>(action: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof TRPCError) throw error;
    if (error instanceof BindError) {
      throw new TRPCError({ code: "CONFLICT", message: error.message, cause: error });
    }
    if (error instanceof ProxyStateError) {
      throw new TRPCError({ code: "CONFLICT", message: error.message, cause: error });
    }
    if (error instanceof NotConfiguredError) {
      throw new TRPCError({ code: "PRECONDITION_FAILED", message: "Set a destination URL before starting", cause: error });
    }
    if (error instanceof SettingsError) {
      throw new TRPCError({ code: "BAD_REQUEST", message: error.message, cause: error });
    }
    logger.error(`Failed to ${action}`, "Control", error);
    throw new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: `Failed to ${action}`, cause: error });
  }
}

export const appRouter = router({
  proxy: router({
    status: publicProcedure.query(({ ctx }) => ctx.controller.status()),

    start: publicProcedure.mutation(({ ctx }) =>
      guard("start proxy", async () => {
        const status = await ctx.controller.start();
        logger.info(`Proxy listening on port ${status.port} (${status.summary})`, "Control");
        return status;
      }),
    ),

    stop: publicProcedure.mutation(({ ctx }) =>
      guard("stop proxy", async () => {
        const status = await ctx.controller.stop();
        logger.info("Proxy stopped", "Control");
        return status;
      }),
    ),

    restart: publicProcedure.mutation(({ ctx }) =>
      guard("restart proxy", async () => {
        const status = await ctx.controller.restart();
        logger.info(`Proxy restarted on port ${status.port} (${status.summary})`, "Control");
        return status;
      }),
    ),
  }),

  settings: router({
    get: publicProcedure.query(({ ctx }) => toSettingsView(ctx.controller.getSettings())),

    update: publicProcedure
      .input(settingsPatchSchema)
      .mutation(({ ctx, input }) =>
        guard("update settings", async () => {
          const result = await ctx.controller.updateSettings(input);
          if (!result.saved) {
            logger.warn("Settings applied but could not be saved", "Control");
          }
          return result;
        }),
      ),

    reset: publicProcedure.mutation(({ ctx }) => guard("reset settings", () => ctx.controller.resetSettings())),
  }),
});

export type AppRouter = typeof appRouter;
