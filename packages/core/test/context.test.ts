import { describe, expect, it } from "vitest";
import { Context } from "~/context/mod.ts";

describe("Context", () => {
  it("should expose request basics", () => {
    const ctx = new Context(
      new Request("http://localhost:8000/users/123", {
        method: "POST",
        headers: { Accept: "application/json" },
      }),
      { id: "123" },
      "users.update",
    );

    expect(ctx.method).toBe("POST");
    expect(ctx.path).toBe("/users/123");
    expect(ctx.params.id).toBe("123");
    expect(ctx.name).toBe("users.update");
    expect(ctx.headers.get("Accept")).toBe("application/json");
  });

  it("should parse query strings and ignore hashes", () => {
    const ctx = new Context(
      new Request("http://localhost:8000/search?q=node&limit=10#top"),
    );

    expect(ctx.path).toBe("/search");
    expect(ctx.query.get("q")).toBe("node");
    expect(ctx.query.get("limit")).toBe("10");
    expect(ctx.url.hash).toBe("#top");
  });

  it("should prefer a precomputed pathname", () => {
    const ctx = new Context(
      new Request("http://localhost/a/b"),
      {},
      undefined,
      "/precomputed",
    );

    expect(ctx.path).toBe("/precomputed");
  });

  it("should keep state across accesses", () => {
    const ctx = new Context(new Request("http://localhost/"));
    ctx.state.user = { id: 1 };

    expect(ctx.state.user).toEqual({ id: 1 });
  });

  it("should build responses", async () => {
    const ctx = new Context(new Request("http://localhost/"));

    const json = ctx.json({ ok: true }, 201);
    expect(json.status).toBe(201);
    expect(await json.json()).toEqual({ ok: true });

    const text = ctx.text("hi");
    expect(text.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
    expect(await text.text()).toBe("hi");

    const html = ctx.html("<p>hi</p>", 404);
    expect(html.status).toBe(404);
    expect(html.headers.get("Content-Type")).toBe("text/html; charset=utf-8");

    const redirect = ctx.redirect("/login");
    expect(redirect.status).toBe(302);
    expect(redirect.headers.get("Location")).toBe("/login");

    expect(ctx.noContent().status).toBe(204);
  });
});
