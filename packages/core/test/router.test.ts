import { describe, expect, it } from "vitest";
import { Context } from "~/context/context.ts";
import { Router } from "~/router/radix.ts";

const mockCtx = () => new Context(new Request("http://localhost/"), {});

describe("Router", () => {
  describe("add()", () => {
    it("should add static routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/users", () => "users");
      router.add("GET", "/posts", () => "posts");

      expect(router.find("GET", "/users")?.handler(mockCtx())).toBe("users");
      expect(router.find("GET", "/posts")?.handler(mockCtx())).toBe("posts");
    });

    it("should add routes with params", () => {
      const router = new Router<Context>();
      router.add("GET", "/orgs/:orgId/users/:userId", () => "orgUser");

      const match = router.find("GET", "/orgs/acme/users/123");
      expect(match?.params).toEqual({ orgId: "acme", userId: "123" });
    });

    it("should add wildcard routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/static/*", () => "static");

      const match = router.find("GET", "/static/css/style.css");
      expect(match?.params["*"]).toBe("css/style.css");
    });

    it("should throw for path not starting with /", () => {
      const router = new Router<Context>();
      expect(() => router.add("GET", "users", () => "users")).toThrow(
        "Route path must start with /",
      );
    });

    it("should throw for duplicate routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/users", () => "users1");
      router.add("GET", "/static/*", () => "static1");

      expect(() => router.add("GET", "/users", () => "users2")).toThrow(
        "Route already registered",
      );
      expect(() => router.add("GET", "/static/*", () => "static2")).toThrow(
        "Wildcard route already registered",
      );
    });
  });

  describe("find()", () => {
    it("should return null for non-existent routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/users", () => "users");

      expect(router.find("GET", "/posts")).toBeNull();
      expect(router.find("POST", "/users")).toBeNull();
      expect(router.find("GET", "/users/list/extra")).toBeNull();
    });

    it("should prefer static over param routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/users/me", () => "me");
      router.add("GET", "/users/:id", () => "byId");

      expect(router.find("GET", "/users/me")?.handler(mockCtx())).toBe("me");
      expect(router.find("GET", "/users/123")?.handler(mockCtx())).toBe(
        "byId",
      );
    });

    it("should prefer param over wildcard routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/files/:name", () => "byName");
      router.add("GET", "/files/*", () => "wildcard");

      expect(router.find("GET", "/files/test.txt")?.handler(mockCtx())).toBe(
        "byName",
      );
      expect(
        router.find("GET", "/files/path/to/file.txt")?.handler(mockCtx()),
      ).toBe("wildcard");
    });

    it("should return frozen empty params for static routes", () => {
      const router = new Router<Context>();
      router.add("GET", "/static", () => "static");

      const match = router.find("GET", "/static");
      expect(Object.isFrozen(match?.params)).toBe(true);
      expect(Object.keys(match?.params ?? {})).toHaveLength(0);
    });

    it("should handle the root path", () => {
      const router = new Router<Context>();
      router.add("GET", "/", () => "root");

      expect(router.find("GET", "/")?.handler(mockCtx())).toBe("root");
    });
  });

  describe("route names", () => {
    it("should return the name with static and param matches", () => {
      const router = new Router<Context>();
      router.add("GET", "/health", () => "ok", "health");
      router.add("GET", "/users/:id", () => "user", "users.show");
      router.add("GET", "/assets/*", () => "asset", "assets");

      expect(router.find("GET", "/health")?.name).toBe("health");
      expect(router.find("GET", "/users/7")?.name).toBe("users.show");
      expect(router.find("GET", "/assets/app.css")?.name).toBe("assets");
    });

    it("should leave unnamed routes without a name", () => {
      const router = new Router<Context>();
      router.add("GET", "/anon", () => "anon");

      expect(router.find("GET", "/anon")?.name).toBeUndefined();
    });
  });

  describe("allowedMethods()", () => {
    it("should list the methods registered for a path", () => {
      const router = new Router<Context>();
      router.add("GET", "/users/:id", () => "get");
      router.add("DELETE", "/users/:id", () => "delete");
      router.add("POST", "/users", () => "create");

      expect(router.allowedMethods("/users/1")).toEqual(["GET", "DELETE"]);
      expect(router.allowedMethods("/nowhere")).toEqual([]);
    });
  });
});
