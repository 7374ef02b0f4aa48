import type { FreshworksClient } from "@crm-relay/freshworks";
import type { AppEnv, Logger } from "@crm-relay/shared";

export type FreshworksApi = Pick<FreshworksClient, "contacts" | "deals">;

export type ApiDeps = {
  env: AppEnv;
  freshworks: FreshworksApi;
  logger: Logger;
};
