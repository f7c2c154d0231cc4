import { describe, expect, it } from "vitest";
import { InternalError, NotFoundError } from "~/errors/mod.ts";
import { fail, settle, succeed } from "~/handlers/outcome.ts";

describe("settle", () => {
  it("should convert strings to text responses", async () => {
    const outcome = await settle(() => "hello");
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.response.headers.get("Content-Type")).toBe(
      "text/plain; charset=utf-8",
    );
    expect(await outcome.response.text()).toBe("hello");
  });

  it("should convert objects to JSON", async () => {
    const outcome = await settle(() => Promise.resolve({ id: 1 }));
    if (!outcome.ok) throw outcome.fault;
    expect(await outcome.response.json()).toEqual({ id: 1 });
  });

  it("should turn null into 204", async () => {
    const outcome = await settle(() => null);
    if (!outcome.ok) throw outcome.fault;
    expect(outcome.response.status).toBe(204);
  });

  it("should send bytes as octet-stream", async () => {
    const outcome = await settle(() => new Uint8Array([1, 2, 3]));
    if (!outcome.ok) throw outcome.fault;
    expect(outcome.response.headers.get("Content-Type")).toBe(
      "application/octet-stream",
    );
    expect(new Uint8Array(await outcome.response.arrayBuffer())).toEqual(
      new Uint8Array([1, 2, 3]),
    );
  });

  it("should pass responses through", async () => {
    const response = new Response("raw", { status: 201 });
    const outcome = await settle(() => response);
    expect(outcome).toEqual({ ok: true, response });
  });

  it("should capture thrown errors", async () => {
    const fault = new NotFoundError();
    const outcome = await settle(() => {
      throw fault;
    });
    expect(outcome).toEqual({ ok: false, fault });
  });

  it("should capture rejections", async () => {
    const outcome = await settle(() => Promise.reject(new RangeError("late")));
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.fault).toBeInstanceOf(RangeError);
  });

  it("should wrap thrown non-errors", async () => {
    const outcome = await settle(() => {
      throw "plain string";
    });
    if (outcome.ok) throw new Error("expected a fault");
    expect(outcome.fault).toBeInstanceOf(InternalError);
  });

  it("should apply a custom transformer", async () => {
    const outcome = await settle(
      () => {
        throw new Error("raw");
      },
      () => new NotFoundError("mapped"),
    );
    if (outcome.ok) throw new Error("expected a fault");
    expect(outcome.fault.message).toBe("mapped");
  });
});

describe("succeed / fail", () => {
  it("should build tagged outcomes", () => {
    const response = new Response();
    const fault = new Error("x");
    expect(succeed(response)).toEqual({ ok: true, response });
    expect(fail(fault)).toEqual({ ok: false, fault });
  });
});
