export type FetchInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

/** The slice of `fetch` the services use; tests pass a fake. */
export type FetchFn = (url: string, init: FetchInit) => Promise<Response>;

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
