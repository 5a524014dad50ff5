import { z } from "zod";
import type { DocumentKind } from "../errors";
import { logger } from "../logger";
import { clearSymbols } from "../utils/symbols";
import { validateDocument } from "./index";

/**
 * String que precisa ser um documento válido; a saída é só com os dígitos.
 */
export function documentSchema(kind: DocumentKind) {
  return z
    .string()
    .superRefine((value, ctx) => {
      const result = validateDocument(kind, value);
      if (!result.success) {
        logger.debug({ kind, reason: result.error }, "document_rejected");
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: result.description,
          params: { reason: result.error }
        });
        return;
      }
      if (!result.data) {
        logger.debug({ kind, reason: "INVALID_CHECK_DIGIT" }, "document_rejected");
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "dígito verificador inválido",
          params: { reason: "INVALID_CHECK_DIGIT" }
        });
      }
    })
    .transform((value) => clearSymbols(value));
}

export const cpfSchema = documentSchema("CPF");
export const cnpjSchema = documentSchema("CNPJ");
export const pisSchema = documentSchema("PIS");
