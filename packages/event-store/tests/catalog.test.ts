/**
 * Tests for EventCatalog and the registry event definitions.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import type { EventSchema } from "../src/catalog.js";
import { createRegistryCatalog, REGISTRY_EVENTS } from "../src/registry-events.js";

const ALICE = "0x00000000000000000000000000000000000000a1";

function schema(version: number): EventSchema {
  return {
    type: "registry.test.happened",
    version,
    description: "test",
    source: "config",
    payload: z.object({ n: z.number() }),
  };
}

describe("EventCatalog", () => {
  it("registers and looks up a schema", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(1));

    expect(catalog.get("registry.test.happened")?.version).toBe(1);
    expect(catalog.types()).toEqual(["registry.test.happened"]);
    expect(catalog.size).toBe(1);
  });

  it("ignores re-registration at the same version", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(1));
    catalog.register(schema(1));
    expect(catalog.size).toBe(1);
  });

  it("rejects a conflicting version", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(1));
    expect(() => catalog.register(schema(2))).toThrow(CatalogError);
  });

  it("rejects a non-positive version", () => {
    expect(() => new EventCatalog().register(schema(0))).toThrow(
      'Schema version for "registry.test.happened" must be a positive integer, got 0',
    );
  });

  it("reports unknown types", () => {
    expect(new EventCatalog().check("nope", {})).toEqual({
      ok: false,
      issues: ['Unknown event type "nope"'],
    });
  });

  it("reports issues with their path", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(1));

    const result = catalog.check("registry.test.happened", { n: "1" });
    expect(result).toEqual({ ok: false, issues: ["n: Expected number, received string"] });
  });
});

describe("createRegistryCatalog", () => {
  const catalog = createRegistryCatalog();

  it("registers every registry event", () => {
    expect(catalog.size).toBe(Object.keys(REGISTRY_EVENTS).length);
    expect(catalog.types()).toContain("registry.intent.submitted");
  });

  it("groups schemas by source", () => {
    expect(catalog.bySource("treasury").map((s) => s.type)).toEqual([
      REGISTRY_EVENTS.TREASURY_TOPPED,
      REGISTRY_EVENTS.TREASURY_WITHDRAWN,
    ]);
  });

  it("validates a submitted payload", () => {
    expect(
      catalog.validate(REGISTRY_EVENTS.INTENT_SUBMITTED, {
        intentId: 1,
        submitter: ALICE,
        side: 1,
        amount: "100",
        limitPrice: "5",
        symbol: `0x${"ab".repeat(32)}`,
        seq: 1,
      }),
    ).toBe(true);
  });

  it("rejects a side other than buy or sell", () => {
    expect(
      catalog.validate(REGISTRY_EVENTS.INTENT_SUBMITTED, {
        intentId: 1,
        submitter: ALICE,
        side: 3,
        amount: "100",
        limitPrice: "5",
        symbol: `0x${"ab".repeat(32)}`,
        seq: 1,
      }),
    ).toBe(false);
  });

  it("rejects a payload with a bigint amount", () => {
    expect(
      catalog.validate(REGISTRY_EVENTS.TREASURY_TOPPED, { amount: 100n, from: ALICE, seq: 1 }),
    ).toBe(false);
  });

  it("rejects unexpected payload fields", () => {
    const result = catalog.check(REGISTRY_EVENTS.PAUSED, { paused: true, seq: 3, by: ALICE });
    expect(result.ok).toBe(false);
  });

  it("validates the paused payload", () => {
    expect(catalog.validate(REGISTRY_EVENTS.PAUSED, { paused: true, seq: 3 })).toBe(true);
    expect(catalog.validate(REGISTRY_EVENTS.PAUSED, { paused: "yes", seq: 3 })).toBe(false);
  });

  it("rejects a fee above 10000 bps", () => {
    expect(
      catalog.validate(REGISTRY_EVENTS.FEE_CHANGED, { previous: 0, next: 10_001, seq: 2 }),
    ).toBe(false);
  });
});
