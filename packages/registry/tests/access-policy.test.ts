/**
 * Tests for AccessPolicy — role and lifecycle predicates.
 */

import { describe, it, expect } from "vitest";
import { CONTROLLER, KEEPER, OWNER, STRANGER, buy, createRegistry } from "./fixtures.js";

describe("AccessPolicy", () => {
  it("answers role questions case-insensitively", () => {
    const { registry } = createRegistry();

    expect(registry.policy.isOwner(OWNER)).toBe(true);
    expect(registry.policy.isController(CONTROLLER)).toBe(true);
    expect(registry.policy.isKeeper(KEEPER)).toBe(true);
    expect(registry.policy.isKeeper(CONTROLLER)).toBe(false);
  });

  it("follows role changes immediately", () => {
    const { registry } = createRegistry();
    registry.setKeeper(OWNER, STRANGER);

    expect(registry.policy.isKeeper(STRANGER)).toBe(true);
    expect(registry.policy.isKeeper(KEEPER)).toBe(false);
  });

  it("canCancel covers the submitter and the owner of a pending intent", () => {
    const { registry } = createRegistry();
    const id = registry.submit(CONTROLLER, buy(10n), 0n);

    expect(registry.policy.canCancel(id, CONTROLLER)).toBe(true);
    expect(registry.policy.canCancel(id, OWNER)).toBe(true);
    expect(registry.policy.canCancel(id, STRANGER)).toBe(false);
    expect(registry.policy.canCancel(99, OWNER)).toBe(false);

    registry.cancel(OWNER, id);
    expect(registry.policy.canCancel(id, OWNER)).toBe(false);
  });

  it("canCancel ignores the pause gate", () => {
    const { registry } = createRegistry();
    const id = registry.submit(CONTROLLER, buy(10n), 0n);
    registry.setPaused(OWNER, true);

    expect(registry.policy.canCancel(id, CONTROLLER)).toBe(true);
  });

  it("canExecute requires a pending intent and an active registry", () => {
    const { registry } = createRegistry();
    const id = registry.submit(CONTROLLER, buy(10n), 0n);

    expect(registry.policy.canExecute(id)).toBe(true);
    registry.setPaused(OWNER, true);
    expect(registry.policy.canExecute(id)).toBe(false);
    registry.setPaused(OWNER, false);

    registry.execute(KEEPER, id, 10n, 1n);
    expect(registry.policy.canExecute(id)).toBe(false);
    expect(registry.policy.canExecute(99)).toBe(false);
  });
});
