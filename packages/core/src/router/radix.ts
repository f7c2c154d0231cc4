import {
  type Handler,
  HTTP_METHODS,
  type HttpMethod,
  type Match,
} from "~/router/types.ts";

const EMPTY_PARAMS: Record<string, string> = Object.freeze(Object.create(null));
const SLASH = 47;
const COLON = 58;
const STAR = 42;

interface RouteData<TContext> {
  handler: Handler<TContext>;
  name?: string;
  paramNames: string[];
}

interface RadixNode<TContext> {
  route: RouteData<TContext> | null;
  children: Map<string, RadixNode<TContext>>;
  paramChild: RadixNode<TContext> | null;
  wildcardRoute: RouteData<TContext> | null;
}

function createNode<TContext>(): RadixNode<TContext> {
  return {
    route: null,
    children: new Map(),
    paramChild: null,
    wildcardRoute: null,
  };
}

/**
 * Radix-tree router with static, `:param` and trailing `*` segments.
 *
 * Static segments win over params, params over wildcards. Each route may
 * carry a name, returned with its match.
 */
export class Router<TContext> {
  private trees = new Map<HttpMethod, RadixNode<TContext>>();
  private staticCache = new Map<string, Match<TContext>>();

  add(
    method: HttpMethod,
    path: string,
    handler: Handler<TContext>,
    name?: string,
  ): void {
    if (path.charCodeAt(0) !== SLASH) {
      throw new Error(`Route path must start with /: ${path}`);
    }

    let tree = this.trees.get(method);
    if (!tree) {
      tree = createNode();
      this.trees.set(method, tree);
    }

    const paramNames: string[] = [];
    let node = tree;
    let isStatic = true;
    let i = 1;
    const len = path.length;

    while (i < len) {
      let j = i;
      while (j < len && path.charCodeAt(j) !== SLASH) j++;
      const segment = path.slice(i, j);
      i = j + 1;

      const firstChar = segment.charCodeAt(0);

      if (firstChar === COLON) {
        isStatic = false;
        paramNames.push(segment.slice(1));
        if (!node.paramChild) {
          node.paramChild = createNode();
        }
        node = node.paramChild;
      } else if (firstChar === STAR) {
        paramNames.push("*");
        if (node.wildcardRoute) {
          throw new Error(
            `Wildcard route already registered: ${method} ${path}`,
          );
        }
        node.wildcardRoute = { handler, name, paramNames: [...paramNames] };
        return;
      } else {
        let child = node.children.get(segment);
        if (!child) {
          child = createNode();
          node.children.set(segment, child);
        }
        node = child;
      }
    }

    if (node.route) {
      throw new Error(`Route already registered: ${method} ${path}`);
    }
    node.route = { handler, name, paramNames };

    if (isStatic) {
      this.staticCache.set(`${method}:${path}`, {
        handler,
        params: EMPTY_PARAMS,
        name,
      });
    }
  }

  find(method: HttpMethod, path: string): Match<TContext> | null {
    const cached = this.staticCache.get(`${method}:${path}`);
    if (cached) return cached;

    const tree = this.trees.get(method);
    if (!tree) return null;

    const paramValues: string[] = [];
    const route = this.match(tree, path, 1, paramValues);
    if (!route) return null;

    const { handler, name, paramNames } = route;
    if (paramNames.length === 0) {
      return { handler, params: EMPTY_PARAMS, name };
    }

    const params: Record<string, string> = Object.create(null);
    for (let i = 0; i < paramNames.length; i++) {
      params[paramNames[i]] = paramValues[i];
    }
    return { handler, params, name };
  }

  /**
   * Methods with a route matching `path`.
   */
  allowedMethods(path: string): HttpMethod[] {
    return HTTP_METHODS.filter((method) => this.find(method, path) !== null);
  }

  private match(
    node: RadixNode<TContext>,
    path: string,
    start: number,
    paramValues: string[],
  ): RouteData<TContext> | null {
    const len = path.length;

    if (start >= len) {
      return node.route;
    }

    let end = start;
    while (end < len && path.charCodeAt(end) !== SLASH) end++;
    const segment = path.slice(start, end);
    const nextStart = end + 1;

    const staticChild = node.children.get(segment);
    if (staticChild) {
      const result = this.match(staticChild, path, nextStart, paramValues);
      if (result) return result;
    }

    if (node.paramChild) {
      paramValues.push(segment);
      const result = this.match(node.paramChild, path, nextStart, paramValues);
      if (result) return result;
      paramValues.pop();
    }

    if (node.wildcardRoute) {
      paramValues.push(path.slice(start));
      return node.wildcardRoute;
    }

    return null;
  }
}
