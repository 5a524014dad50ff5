import { describe, expect, it } from "vitest";
import { clearSymbols } from "./symbols";

describe("clearSymbols", () => {
  it("should strip document punctuation", () => {
    expect(clearSymbols("11.222.333/0001-81")).toBe("11222333000181");
  });

  it("should trim before stripping", () => {
    expect(clearSymbols("  111.444.777-35\t")).toBe("11144477735");
  });

  it("should strip every listed symbol", () => {
    expect(clearSymbols("a_b,c\\d|e~f#g$h%i&j@k\"l'm*n=o+pªqºr>s<t:u;v?w!")).toBe("abcdefghijklmnopqrstuvw");
  });

  it("should keep inner spaces, letters and accents", () => {
    expect(clearSymbols("Rua São João, nº 10")).toBe("Rua São João n 10");
  });

  it("should return an empty string for empty input", () => {
    expect(clearSymbols("")).toBe("");
    expect(clearSymbols("   ")).toBe("");
  });

  it("should be idempotent", () => {
    const once = clearSymbols("529.982.247-25");
    expect(clearSymbols(once)).toBe("52998224725");
  });
});
