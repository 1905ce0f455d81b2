import { describe, expect, it } from "vitest";
import { createKid, createMoment } from "../src/family/familyStore";
import { validateKid, validateMoment } from "../src/family/schemaValidators";
import { MemoryGateway } from "./support/memoryGateway";

describe("kid schema", () => {
  it("accepts a minimal kid and defaults the access list to empty", () => {
    const kid: Record<string, unknown> = { name: "Ava", parentEmail: "parent@example.test" };

    expect(validateKid(kid)).toBe(true);
    expect(kid["allowedGrandparents"]).toEqual([]);
  });

  it("rejects an empty name", () => {
    expect(validateKid({ name: "", parentEmail: "parent@example.test" })).toBe(false);
  });

  it("rejects an impossible birthdate", () => {
    expect(
      validateKid({ name: "Ava", parentEmail: "parent@example.test", birthdate: "2021-13-40" })
    ).toBe(false);
    expect(
      validateKid({ name: "Ava", parentEmail: "parent@example.test", birthdate: "2021-06-30" })
    ).toBe(true);
  });
});

describe("moment schema", () => {
  it("fills in type, visibility and tags", () => {
    const moment: Record<string, unknown> = { kidId: "kid1", title: "Park" };

    expect(validateMoment(moment)).toBe(true);
    expect(moment).toEqual({
      kidId: "kid1",
      title: "Park",
      type: "photo",
      visibility: "public",
      tags: []
    });
  });

  it("rejects creation stamps that are not RFC 3339 date-times", () => {
    expect(validateMoment({ kidId: "kid1", title: "Park", createdAt: "yesterday" })).toBe(false);
    expect(validateMoment({ kidId: "kid1", title: "Park", createdAt: "2026-02-01 10:00" })).toBe(false);
    expect(validateMoment({ kidId: "kid1", title: "Park", createdAt: "2026-02-01T10:00:00.500Z" })).toBe(true);
    expect(validateKid({ name: "Ava", parentEmail: "p@example.test", updatedAt: "soon" })).toBe(false);
  });

  it("rejects unknown moment types and visibilities", () => {
    expect(validateMoment({ kidId: "kid1", title: "Clay", type: "sculpture" })).toBe(false);
    expect(validateMoment({ kidId: "kid1", title: "Clay", visibility: "friends" })).toBe(false);
  });
});

describe("record creation", () => {
  it("stores a validated kid with timestamps", async () => {
    const gateway = new MemoryGateway();
    const id = await createKid(gateway, { name: "Ava", parentEmail: "parent@example.test" });

    const stored = await gateway.findById("kid", id);
    expect(stored?.data).toEqual({
      name: "Ava",
      parentEmail: "parent@example.test",
      allowedGrandparents: [],
      createdAt: "2026-03-01T09:00:00.000Z",
      updatedAt: "2026-03-01T09:00:00.000Z"
    });
  });

  it("accepts a moment for a kid that does not exist", async () => {
    const gateway = new MemoryGateway();
    const id = await createMoment(gateway, { kidId: "ghost", title: "Orphaned" });

    expect(id).toBe("doc0001");
    expect(gateway.count("moment")).toBe(1);
  });

  it("names the missing field when a kid is invalid", async () => {
    const gateway = new MemoryGateway();

    await expect(
      createKid(gateway, { name: "Ava", parentEmail: "" })
    ).rejects.toMatchObject({
      code: "invalid-argument",
      message: "Invalid kid: /parentEmail must NOT have fewer than 1 characters"
    });
    expect(gateway.count("kid")).toBe(0);
  });

  it("rejects a moment without a title", async () => {
    const gateway = new MemoryGateway();

    await expect(
      createMoment(gateway, { kidId: "kid1", title: "" })
    ).rejects.toMatchObject({ code: "invalid-argument" });
  });
});
