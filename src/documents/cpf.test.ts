import { describe, expect, it } from "vitest";
import { DocumentError } from "../errors";
import { checkCpf, isValidCPF } from "./cpf";

describe("CPF", () => {
  describe("isValidCPF", () => {
    it("should return true for a valid CPF", () => {
      expect(isValidCPF("111.444.777-35")).toBe(true);
      expect(isValidCPF("529.982.247-25")).toBe(true);
      expect(isValidCPF("52998224725")).toBe(true);
    });

    it("should return false for wrong check digits", () => {
      expect(isValidCPF("111.444.777-36")).toBe(false);
      expect(isValidCPF("529.982.247-24")).toBe(false);
    });

    it("should ignore surrounding whitespace", () => {
      expect(isValidCPF("  111.444.777-35\n")).toBe(true);
    });

    it("should not special-case repeated digits", () => {
      expect(isValidCPF("000.000.000-00")).toBe(true);
    });

    it("should be deterministic", () => {
      const first = isValidCPF("111.444.777-35");
      expect(isValidCPF("111.444.777-35")).toBe(first);
    });

    it("should throw for a wrong length", () => {
      expect(() => isValidCPF("111.444.777-3")).toThrow(DocumentError);
      expect(() => isValidCPF("")).toThrow("Tamanho do documento incorreto: esperado 11 dígitos, recebido 0.");
      expect(() => isValidCPF("111.444.777-355")).toThrow(
        "Tamanho do documento incorreto: esperado 11 dígitos, recebido 12."
      );
    });

    it("should throw a format error for letters", () => {
      expect(() => isValidCPF("111444777ab")).toThrow("Documento contém caracteres não numéricos.");
    });
  });

  describe("checkCpf", () => {
    it("should wrap the boolean", () => {
      expect(checkCpf("111.444.777-35")).toEqual({ success: true, data: true });
      expect(checkCpf("111.444.777-36")).toEqual({ success: true, data: false });
    });

    it("should return the error instead of throwing", () => {
      expect(checkCpf("111.444.777-3")).toEqual({
        success: false,
        error: "INVALID_LENGTH",
        description: "Tamanho do documento incorreto: esperado 11 dígitos, recebido 10."
      });
    });
  });
});
