export { Context } from "~/context/context.ts";
