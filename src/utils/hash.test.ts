import { describe, expect, it } from "vitest";

import { stableDocId } from "./hash.js";

describe("stableDocId", () => {
  it("is a stable 24-char hex id", () => {
    const id = stableDocId(7, "u-photo-1", "1767607200_u-photo-1_100.jpg");

    expect(id).toMatch(/^[0-9a-f]{24}$/);
    expect(stableDocId(7, "u-photo-1", "1767607200_u-photo-1_100.jpg")).toBe(id);
    expect(stableDocId(7, "u-photo-2", "1767607200_u-photo-2_100.jpg")).not.toBe(id);
  });

  it("does not confuse parts that contain the separator", () => {
    expect(stableDocId("a:b", "c")).not.toBe(stableDocId("a", "b:c"));
  });

  it("distinguishes a number from its string form", () => {
    expect(stableDocId(7)).not.toBe(stableDocId("7"));
  });
});
