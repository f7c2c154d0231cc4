export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "HEAD"
  | "OPTIONS";

export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
];

export type Handler<TContext> = (ctx: TContext) => unknown;

export interface Match<TContext> {
  handler: Handler<TContext>;
  params: Record<string, string>;
  /** Route name, if the route has one */
  name?: string;
}
