export { Router } from "~/router/radix.ts";
export { HTTP_METHODS } from "~/router/types.ts";
export type { Handler, HttpMethod, Match } from "~/router/types.ts";
