import { z } from "zod";

const envSchema = z.object({
  FRESHWORKS_DOMAIN: z.string().trim().min(1),
  FRESHWORKS_API_KEY: z.string().min(1),
  CONTACTS_VIEW_ID: z.string().trim().min(1).default("402014829835"),
  DEALS_VIEW_ID: z.string().trim().min(1).default("402014829847"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_PAGES: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export type AppEnv = {
  freshworksDomain: string;
  freshworksApiKey: string;
  contactsViewId: string;
  dealsViewId: string;
  requestTimeoutMs: number;
  maxPages: number;
  logLevel: LogLevel;
};

export function loadEnv(raw: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.parse(raw);

  return {
    freshworksDomain: parsed.FRESHWORKS_DOMAIN,
    freshworksApiKey: parsed.FRESHWORKS_API_KEY,
    contactsViewId: parsed.CONTACTS_VIEW_ID,
    dealsViewId: parsed.DEALS_VIEW_ID,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    maxPages: parsed.MAX_PAGES,
    logLevel: parsed.LOG_LEVEL
  };
}
