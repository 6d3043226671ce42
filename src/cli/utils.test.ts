import { describe, expect, it } from "vitest";
import { formatOutput } from "./utils";

describe("formatOutput", () => {
  it("should print bigint fields as exact integers", () => {
    expect(formatOutput({ size: 2, mtimeNs: 1_760_000_000_123_456_789n })).toBe(
      '{\n  "size": 2,\n  "mtimeNs": 1760000000123456789\n}',
    );
  });
});
