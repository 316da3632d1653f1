import type { CreateExpressContextOptions } from "@trpc/server/adapters/express";
import type { ProxyController } from "../controller";

export type TrpcContext = {
  controller: ProxyController;
  req?: CreateExpressContextOptions["req"];
  res?: CreateExpressContextOptions["res"];
};

export function createContextFactory(controller: ProxyController) {
  return ({ req, res }: CreateExpressContextOptions): TrpcContext => ({ req, res, controller });
}
