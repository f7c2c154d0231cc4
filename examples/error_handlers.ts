/**
 * Route-scoped exception handlers.
 *
 * The same fault class renders as JSON for the API route and as HTML for
 * the web route; everything else falls back to the built-in renderer.
 *
 * Run with:
 *   npm run example
 */

import {
  Faultline,
  FaultlineError,
  NotFoundError,
  ValidationError,
} from "../mod.ts";

class PaymentError extends FaultlineError {
  constructor(message: string) {
    super(message, 402, "PAYMENT_REQUIRED");
  }
}

class CardDeclinedError extends PaymentError {}

const app = new Faultline({ debug: false, fallback: "auto" });

app
  .post("/api/orders", () => {
    throw new ValidationError("Invalid order", [
      { field: "quantity", message: "must be positive" },
    ]);
  }, { name: "api.orders" })
  .get("/orders/new", () => {
    throw new ValidationError("Invalid order");
  }, { name: "web.orders" })
  .post("/api/checkout", () => {
    throw new CardDeclinedError("Card declined");
  }, { name: "api.checkout" })
  .get("/broken", () => {
    throw new Error("database unreachable");
  });

app.exception(
  ValidationError,
  (_ctx, error) =>
    Response.json({ invalid: error.message }, { status: 422 }),
  { routes: ["api.orders"] },
);

app.exception(
  ValidationError,
  (_ctx, error) =>
    new Response(`<p>${error.message}</p>`, {
      status: 422,
      headers: { "Content-Type": "text/html; charset=utf-8" },
    }),
  { routes: ["web.orders"] },
);

// CardDeclinedError has no handler of its own; its parent's applies.
app.exception(PaymentError, (_ctx, error) =>
  Response.json({ payment: error.message }, { status: 402 }));

app.exception(NotFoundError, function brokenNotFound() {
  throw new Error("template missing");
});

const requests = [
  new Request("http://localhost/api/orders", { method: "POST" }),
  new Request("http://localhost/orders/new"),
  new Request("http://localhost/api/checkout", { method: "POST" }),
  new Request("http://localhost/broken", {
    headers: { Accept: "application/json" },
  }),
  new Request("http://localhost/missing"),
];

for (const request of requests) {
  const response = await app.fetch(request);
  console.log(
    `${request.method} ${request.url} -> ${response.status}`,
    await response.text(),
  );
}
