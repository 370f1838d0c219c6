import { describe, it, expect } from "vitest";
import { validate, version } from "uuid";
import { uuidv7 } from "../src/utils/uuid";

describe("uuidv7", () => {
  it("should generate valid version 7 UUIDs", () => {
    const id = uuidv7();
    expect(validate(id)).toBe(true);
    expect(version(id)).toBe(7);
  });

  it("should sort by creation order", () => {
    const ids = Array.from({ length: 50 }, () => uuidv7());
    expect([...ids].sort()).toEqual(ids);
  });

  it("should not repeat", () => {
    const ids = new Set(Array.from({ length: 100 }, () => uuidv7()));
    expect(ids.size).toBe(100);
  });
});
