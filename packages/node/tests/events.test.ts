/**
 * Tests for event query routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, as, readJson, submitBuy, CONTROLLER, KEEPER, OWNER, STRANGER } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

interface EventBody {
  streamId: string;
  version: number;
  globalPosition: number;
  event: {
    type: string;
    metadata: { actor: string; correlationId: string; source: string };
    payload: Record<string, unknown>;
  };
}

interface EventPage {
  data: EventBody[];
  pagination: { cursor: string | null; hasMore: boolean };
}

let instance: AppInstance;

beforeEach(async () => {
  instance = createTestApp();
  await submitBuy(instance, "1000");
  await instance.app.request(
    as(KEEPER, "/api/v1/intents/1/execute", "POST", { executedAmount: "400", avgPrice: "7" }),
  );
  await instance.app.request(as(OWNER, "/api/v1/config/fee", "PUT", { feeBps: 30 }));
  await instance.app.request(as(STRANGER, "/api/v1/treasury/deposit", "POST", { amount: "9" }));
});

describe("GET /api/v1/events", () => {
  it("returns every event in global order", async () => {
    const res = await instance.app.request("/api/v1/events");
    const body = await readJson<EventPage>(res);

    expect(body.data.map((e) => [e.globalPosition, e.streamId, e.event.type])).toEqual([
      [1, "intent-1", "registry.intent.submitted"],
      [2, "intent-1", "registry.intent.executed"],
      [3, "config", "registry.config.fee-changed"],
      [4, "treasury", "registry.treasury.topped"],
    ]);
  });

  it("carries bigint values as strings and the sequence marker as correlation id", async () => {
    const res = await instance.app.request("/api/v1/events?type=registry.intent.executed");
    const body = await readJson<EventPage>(res);

    expect(body.data).toHaveLength(1);
    const [executed] = body.data;
    expect(executed?.event.payload).toEqual({
      intentId: 1,
      executor: KEEPER,
      executedAmount: "400",
      avgPrice: "7",
      seq: 2,
    });
    expect(executed?.event.metadata.correlationId).toBe("seq-2");
    expect(executed?.event.metadata.actor).toBe(KEEPER);
  });

  it("pages with a cursor and skips past a position", async () => {
    const first = await readJson<EventPage>(await instance.app.request("/api/v1/events?limit=3"));
    expect(first.data.map((e) => e.globalPosition)).toEqual([1, 2, 3]);
    expect(first.pagination.hasMore).toBe(true);

    const rest = await readJson<EventPage>(
      await instance.app.request(`/api/v1/events?cursor=${first.pagination.cursor ?? ""}`),
    );
    expect(rest.data.map((e) => e.globalPosition)).toEqual([4]);

    const after = await readJson<EventPage>(
      await instance.app.request("/api/v1/events?afterPosition=2"),
    );
    expect(after.data.map((e) => e.globalPosition)).toEqual([3, 4]);
  });
});

describe("GET /api/v1/events/:streamId", () => {
  it("returns one stream in version order", async () => {
    const res = await instance.app.request("/api/v1/events/intent-1");
    const body = await readJson<EventPage>(res);

    expect(body.data.map((e) => [e.version, e.event.type])).toEqual([
      [1, "registry.intent.submitted"],
      [2, "registry.intent.executed"],
    ]);
    expect(body.data[0]?.event.metadata.actor).toBe(CONTROLLER);
  });

  it("returns 404 for a stream with no events", async () => {
    const res = await instance.app.request("/api/v1/events/intent-99");
    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("NOT_FOUND");
  });
});
