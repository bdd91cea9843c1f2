import { RingBuffer } from "../../monitor/ring-buffer";

describe("RingBuffer", () => {
  it("should keep items in insertion order below capacity", () => {
    const buffer = new RingBuffer<number>(4);
    [1, 2, 3].forEach((n) => buffer.push(n));

    expect(buffer.size).toBe(3);
    expect(buffer.tail(10)).toEqual([1, 2, 3]);
  });

  it("should evict the oldest items once full", () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5, 6, 7].forEach((n) => buffer.push(n));

    expect(buffer.size).toBe(3);
    expect(buffer.tail(3)).toEqual([5, 6, 7]);
  });

  it("should return only the newest items for a small limit", () => {
    const buffer = new RingBuffer<string>(5);
    ["a", "b", "c", "d", "e", "f"].forEach((s) => buffer.push(s));

    expect(buffer.tail(2)).toEqual(["e", "f"]);
    expect(buffer.tail(0)).toEqual([]);
    expect(buffer.tail(-3)).toEqual([]);
  });

  it("should reject a non-positive capacity", () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(2.5)).toThrow(RangeError);
  });
});
