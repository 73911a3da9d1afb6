import { describe, it, expect } from "vitest";
import { TextInputStream, TextOutputStream } from "../src/index.js";

describe("TextInputStream", () => {
  it("starts good", () => {
    const input = new TextInputStream("1");
    expect(input.good).toBe(true);
    expect(input.eof).toBe(false);
    expect(input.fail).toBe(false);
  });

  it("reads integers after whitespace", () => {
    const input = new TextInputStream("  -42 17");
    expect(input.readInteger("int32")).toBe(-42n);
    expect(input.position).toBe(5);
    expect(input.readInteger("int32")).toBe(17n);
    expect(input.eof).toBe(true);
    expect(input.fail).toBe(false);
  });

  it("stops at the first non-digit", () => {
    const input = new TextInputStream("12abc");
    expect(input.readInteger("int8")).toBe(12n);
    expect(input.remaining()).toBe("abc");
    expect(input.peek()).toBe("a");
    expect(input.good).toBe(true);
  });

  it("fails without digits and consumes nothing", () => {
    const input = new TextInputStream("abc");
    expect(input.readInteger("int8")).toBe(0n);
    expect(input.fail).toBe(true);
    expect(input.eof).toBe(false);
    expect(input.remaining()).toBe("abc");
  });

  it("sets eof and fail on empty input", () => {
    const input = new TextInputStream("   ");
    expect(input.readInteger("int8")).toBe(0n);
    expect(input.eof).toBe(true);
    expect(input.fail).toBe(true);
  });

  it("clamps out-of-range values and fails", () => {
    const high = new TextInputStream("300");
    expect(high.readInteger("int8")).toBe(127n);
    expect(high.fail).toBe(true);

    const low = new TextInputStream("-200");
    expect(low.readInteger("int8")).toBe(-128n);
    expect(low.fail).toBe(true);
  });

  it("stays failed until cleared", () => {
    const input = new TextInputStream("x 5");
    input.readInteger("int8");
    input.ignore(2);
    expect(input.readInteger("int8")).toBe(0n);
    expect(input.remaining()).toBe("x 5");
    input.clear();
    expect(input.good).toBe(true);
    input.ignore(2);
    expect(input.readInteger("int8")).toBe(5n);
  });

  it("ignore skips any characters", () => {
    const input = new TextInputStream("ab7");
    input.ignore(2);
    expect(input.readInteger("int8")).toBe(7n);
  });

  it("ignore past the end sets eof only", () => {
    const input = new TextInputStream("a");
    input.ignore(3);
    expect(input.eof).toBe(true);
    expect(input.fail).toBe(false);
    expect(input.atEnd()).toBe(true);
  });

  it("ignore at eof sets fail", () => {
    const input = new TextInputStream("5");
    input.readInteger("int8");
    expect(input.eof).toBe(true);
    input.ignore();
    expect(input.fail).toBe(true);
  });

  it("setFail marks the stream failed", () => {
    const input = new TextInputStream("1");
    input.setFail();
    expect(input.good).toBe(false);
    expect(input.readInteger("int8")).toBe(0n);
  });
});

describe("TextOutputStream", () => {
  it("accumulates written parts", () => {
    const out = new TextOutputStream();
    out.write("a", 1, 2n).write("/");
    expect(out.toString()).toBe("a12/");
  });
});
