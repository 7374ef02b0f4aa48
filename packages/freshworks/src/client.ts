import { logger as defaultLogger, type Logger } from "@crm-relay/shared";
import { enrichDeals } from "./enrich.js";
import { FreshworksRequestError } from "./errors.js";
import { collectPages } from "./pagination.js";
import type {
  FreshworksContact,
  FreshworksContactResponse,
  FreshworksContactsResponse,
  FreshworksDeal,
  FreshworksDealResponse,
  FreshworksDealsResponse,
  ListQuery,
  RequestOptions
} from "./types.js";

const DEFAULT_PER_PAGE = 25;
const COLLECT_PER_PAGE = 100;
const DEFAULT_MAX_PAGES = 100;

export type FreshworksClientConfig = {
  domain: string;
  apiKey: string;
  contactsViewId: string | number;
  dealsViewId: string | number;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
};

export class FreshworksClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly contactsViewId: string | number;
  private readonly dealsViewId: string | number;
  private readonly logger: Logger;

  constructor(config: FreshworksClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? `https://${config.domain}.myfreshworks.com/crm/sales/api`).replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.contactsViewId = config.contactsViewId;
    this.dealsViewId = config.dealsViewId;
    this.logger = config.logger ?? defaultLogger;
  }

  async request<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\//, "")}`);

    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value === undefined || value === null || value === "") {
        continue;
      }
      url.searchParams.set(key, String(value));
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const response = await fetch(url, {
      method: "GET",
      headers: {
        authorization: `Token token=${this.apiKey}`,
        "content-type": "application/json"
      },
      signal: options.signal ? AbortSignal.any([options.signal, timeout]) : timeout
    });

    if (!response.ok) {
      const responseText = await response.text();
      throw new FreshworksRequestError("GET", path, response.status, responseText);
    }

    return (await response.json()) as T;
  }

  contacts = {
    list: async (query: ListQuery = {}): Promise<FreshworksContactsResponse> => {
      const viewId = query.viewId ?? this.contactsViewId;
      const page = query.page ?? 1;
      const path = `contacts/view/${encodeURIComponent(String(viewId))}`;
      const result = await this.request<FreshworksContactsResponse>(path, {
        query: {
          page,
          per_page: query.perPage ?? DEFAULT_PER_PAGE,
          include: query.include ?? "owner"
        },
        signal: query.signal
      });
      this.logger.debug({ viewId, page, count: result.contacts?.length ?? 0 }, "Fetched contacts page");
      return result;
    },
    get: async (id: number, include = "owner"): Promise<FreshworksContactResponse> =>
      this.request<FreshworksContactResponse>(`contacts/${id}`, { query: { include } }),
    listAll: async (maxPages = DEFAULT_MAX_PAGES, signal?: AbortSignal): Promise<FreshworksContact[]> =>
      collectPages(async (page) => {
        const result = await this.contacts.list({ page, perPage: COLLECT_PER_PAGE, signal });
        return { items: result.contacts ?? [], meta: result.meta };
      }, maxPages)
  };

  deals = {
    list: async (query: ListQuery = {}): Promise<FreshworksDealsResponse> => {
      const viewId = query.viewId ?? this.dealsViewId;
      const page = query.page ?? 1;
      const path = `deals/view/${encodeURIComponent(String(viewId))}`;
      const result = await this.request<FreshworksDealsResponse>(path, {
        query: {
          page,
          per_page: query.perPage ?? DEFAULT_PER_PAGE,
          sort: "amount",
          include: query.include ?? "owner"
        },
        signal: query.signal
      });

      const deals = result.deals ?? [];
      enrichDeals(deals, result.users ?? []);
      this.logger.debug({ viewId, page, count: deals.length }, "Fetched deals page");
      return result;
    },
    get: async (id: number, include = "owner,contact"): Promise<FreshworksDealResponse> =>
      this.request<FreshworksDealResponse>(`deals/${id}`, { query: { include } }),
    listAll: async (maxPages = DEFAULT_MAX_PAGES, signal?: AbortSignal): Promise<FreshworksDeal[]> =>
      collectPages(async (page) => {
        const result = await this.deals.list({ page, perPage: COLLECT_PER_PAGE, signal });
        return { items: result.deals ?? [], meta: result.meta };
      }, maxPages)
  };
}
