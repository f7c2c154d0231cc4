import { describe, expect, it } from "vitest";
import {
  BadRequestError,
  escapeHtml,
  FaultlineError,
  MethodNotAllowedError,
  negotiateFormat,
  NotFoundError,
  renderError,
} from "~/errors/mod.ts";

const GENERIC =
  "The server encountered an internal error and cannot complete your request.";

const withAccept = (accept: string) =>
  new Request("http://localhost/", { headers: { Accept: accept } });

describe("negotiateFormat", () => {
  it("should default to text without a request or Accept header", () => {
    expect(negotiateFormat(null, "auto")).toBe("text");
    expect(negotiateFormat(new Request("http://localhost/"), "auto")).toBe(
      "text",
    );
  });

  it("should honor a forced format", () => {
    expect(negotiateFormat(withAccept("text/html"), "json")).toBe("json");
    expect(negotiateFormat(null, "html")).toBe("html");
  });

  it("should pick the first supported type in header order", () => {
    expect(negotiateFormat(withAccept("text/html,application/json"), "auto"))
      .toBe("html");
    expect(negotiateFormat(withAccept("application/json, text/html"), "auto"))
      .toBe("json");
  });

  it("should order by quality", () => {
    expect(
      negotiateFormat(
        withAccept("application/json;q=0.5, text/html;q=0.8"),
        "auto",
      ),
    ).toBe("html");
  });

  it("should treat +json suffixes as json", () => {
    expect(negotiateFormat(withAccept("application/problem+json"), "auto"))
      .toBe("json");
  });

  it("should skip rejected and unknown types", () => {
    expect(negotiateFormat(withAccept("text/html;q=0"), "auto")).toBe("text");
    expect(negotiateFormat(withAccept("image/png, */*"), "auto")).toBe("text");
  });
});

describe("escapeHtml", () => {
  it("should escape markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });
});

describe("renderError", () => {
  it("should render text with status title", async () => {
    const response = renderError(null, new NotFoundError(), false, "text");
    expect(response.status).toBe(404);
    expect(response.headers.get("Content-Type")).toBe(
      "text/plain; charset=utf-8",
    );
    expect(await response.text()).toBe("404 Not Found\n\nNot Found");
  });

  it("should hide messages of unexpected errors outside debug", async () => {
    const response = renderError(null, new Error("secret"), false, "text");
    expect(response.status).toBe(500);
    expect(await response.text()).toBe(
      `500 Internal Server Error\n\n${GENERIC}`,
    );
  });

  it("should show message and stack in debug", async () => {
    const fault = new Error("secret");
    const response = renderError(null, fault, true, "text");
    expect(await response.text()).toBe(
      `500 Internal Server Error\n\nsecret\n\n${fault.stack}`,
    );
  });

  it("should render JSON", async () => {
    const response = renderError(null, new NotFoundError(), false, "json");
    expect(response.headers.get("Content-Type")).toBe("application/json");
    expect(await response.json()).toEqual({
      error: { message: "Not Found", code: "NOT_FOUND", status: 404 },
    });
  });

  it("should render JSON for unexpected errors", async () => {
    const response = renderError(null, new Error("secret"), false, "json");
    expect(await response.json()).toEqual({
      error: { message: GENERIC, code: "INTERNAL_ERROR", status: 500 },
    });
  });

  it("should use the fault's own stack in debug JSON", async () => {
    const fault = new Error("secret");
    const response = renderError(null, fault, true, "json");
    const body = await response.json();
    expect(body.error.message).toBe("secret");
    expect(body.error.stack[0]).toBe(fault.stack?.split("\n")[0].trim());
    expect(body.error.details).toEqual({ originalName: "Error" });
  });

  it("should render escaped HTML", async () => {
    const response = renderError(
      null,
      new BadRequestError("<b>bad</b>"),
      false,
      "html",
    );
    expect(response.headers.get("Content-Type")).toBe(
      "text/html; charset=utf-8",
    );
    const lines = (await response.text()).split("\n");
    expect(lines).toContain("<title>400 Bad Request</title>");
    expect(lines).toContain("<h1>400 Bad Request</h1>");
    expect(lines).toContain("<p>&lt;b&gt;bad&lt;/b&gt;</p>");
    expect(lines.some((line) => line.startsWith("<pre>"))).toBe(false);
  });

  it("should negotiate from the request", async () => {
    const response = renderError(
      withAccept("application/json"),
      new NotFoundError(),
      false,
      "auto",
    );
    expect(response.headers.get("Content-Type")).toBe("application/json");
  });

  it("should copy error headers", () => {
    const response = renderError(
      null,
      new MethodNotAllowedError(undefined, ["GET"]),
      false,
      "text",
    );
    expect(response.status).toBe(405);
    expect(response.headers.get("Allow")).toBe("GET");
  });

  it("should title unknown statuses generically", async () => {
    const response = renderError(
      null,
      new FaultlineError("teapot", 418, "TEAPOT"),
      false,
      "text",
    );
    expect(response.status).toBe(418);
    expect(await response.text()).toBe("418 Error\n\nteapot");
  });
});
