export type RequestOptions = {
  query?: Record<string, string | number | boolean | undefined | null>;
  signal?: AbortSignal;
};

export type FreshworksPageMeta = {
  total_pages?: unknown;
  total?: unknown;
  [key: string]: unknown;
};

export type FreshworksUser = {
  id: number;
  display_name?: string;
  email?: string;
  is_active?: boolean;
  [key: string]: unknown;
};

export type FreshworksContact = {
  id: number;
  first_name?: string | null;
  last_name?: string | null;
  display_name?: string;
  email?: string | null;
  mobile_number?: string | null;
  owner_id?: number | null;
  [key: string]: unknown;
};

export type FreshworksDealStage = {
  id: number;
  name: string;
};

export type FreshworksDeal = {
  id: number;
  name?: string;
  amount?: string | number | null;
  owner_id?: number | null;
  deal_stage_id?: number | null;
  owner?: FreshworksUser;
  deal_stage?: FreshworksDealStage;
  [key: string]: unknown;
};

export type FreshworksContactsResponse = {
  contacts?: FreshworksContact[];
  users?: FreshworksUser[];
  meta?: FreshworksPageMeta;
};

export type FreshworksDealsResponse = {
  deals?: FreshworksDeal[];
  users?: FreshworksUser[];
  meta?: FreshworksPageMeta;
};

export type FreshworksContactResponse = {
  contact: FreshworksContact;
  users?: FreshworksUser[];
  [key: string]: unknown;
};

export type FreshworksDealResponse = {
  deal: FreshworksDeal;
  users?: FreshworksUser[];
  [key: string]: unknown;
};

export type ListQuery = {
  page?: number;
  perPage?: number;
  viewId?: string | number;
  include?: string;
  signal?: AbortSignal;
};
