/**
 * Raised by the transport when the CRM answers with a non-2xx status.
 * Network failures are not wrapped; they surface as thrown by `fetch`.
 */
export class FreshworksRequestError extends Error {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  readonly responseBody: string;

  constructor(method: string, path: string, status: number, responseBody: string) {
    super(`Freshworks request failed ${method} ${path} status=${status} body=${responseBody}`);
    this.name = "FreshworksRequestError";
    this.method = method;
    this.path = path;
    this.status = status;
    this.responseBody = responseBody;
  }
}

export function isFreshworksRequestError(error: unknown): error is FreshworksRequestError {
  return error instanceof FreshworksRequestError;
}
