import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { buildTestApp } from "../helpers/test-app.js";
import { changeNotification, lifecycleNotification, makeSubscription } from "../helpers/test-fixtures.js";

function post(body: string) {
  return { method: "POST", headers: { "Content-Type": "application/json" }, body };
}

describe("Webhook API", () => {
  let ctx: ReturnType<typeof buildTestApp>;

  beforeEach(() => {
    ctx = buildTestApp({ queueCapacity: 1 });
    ctx.table.put(makeSubscription());
  });

  afterEach(() => {
    ctx.database.close();
  });

  it("echoes the validation token from the query string", async () => {
    const res = await ctx.app.request("/webhook/notifications?validationToken=token%20123", { method: "POST" });

    assert.strictEqual(res.status, 200);
    assert.strictEqual(await res.text(), "token 123");
    assert.ok(res.headers.get("content-type")?.startsWith("text/plain"));
  });

  it("echoes a validation token sent in the body", async () => {
    const res = await ctx.app.request(
      "/webhook/lifecycle",
      post(JSON.stringify({ validationToken: "token-456" }))
    );

    assert.strictEqual(res.status, 200);
    assert.strictEqual(await res.text(), "token-456");
  });

  it("accepts a notification batch and enqueues the event", async () => {
    const res = await ctx.app.request(
      "/webhook/notifications",
      post(JSON.stringify({ value: [changeNotification()] }))
    );

    assert.strictEqual(res.status, 202);
    assert.strictEqual(ctx.queue.claim()?.payload.messageId, "msg-1");
  });

  it("answers 202 for rejected items so the provider does not retry them", async () => {
    const res = await ctx.app.request(
      "/webhook/notifications",
      post(JSON.stringify({ value: [changeNotification({ clientState: "wrong" })] }))
    );

    assert.strictEqual(res.status, 202);
    assert.strictEqual(ctx.queue.stats().pending, 0);
  });

  it("returns 503 when the queue is full", async () => {
    const body = JSON.stringify({
      value: [changeNotification(), changeNotification({ resourceData: { id: "msg-2" } })],
    });

    const res = await ctx.app.request("/webhook/notifications", post(body));

    assert.strictEqual(res.status, 503);
    assert.strictEqual(await res.text(), "Overloaded");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await ctx.app.request("/webhook/notifications", post("{not json"));

    assert.strictEqual(res.status, 400);
    assert.strictEqual(await res.text(), "Invalid notification format");
  });

  it("accepts lifecycle notifications", async () => {
    const res = await ctx.app.request(
      "/webhook/lifecycle",
      post(JSON.stringify({ value: [lifecycleNotification({ lifecycleEvent: "reauthorizationRequired" })] })
      )
    );

    assert.strictEqual(res.status, 202);
    assert.strictEqual(ctx.table.get("sub-1")?.status, "expiring");
  });

  it("is public even when basic auth is configured", async () => {
    const secured = buildTestApp({ basicAuth: { username: "admin", password: "test-secret" } });
    try {
      const res = await secured.app.request("/webhook/notifications?validationToken=abc", { method: "POST" });
      assert.strictEqual(res.status, 200);
    } finally {
      secured.database.close();
    }
  });
});
