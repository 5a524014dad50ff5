import type { DocumentKind } from "../errors";
import { checkDocument, type DocumentDescriptor, type DocumentResult } from "./checkDigits";
import { CNPJ } from "./cnpj";
import { CPF } from "./cpf";
import { PIS } from "./pis";

export const DESCRIPTORS: Record<DocumentKind, DocumentDescriptor> = { CPF, CNPJ, PIS };

export function validateDocument(kind: DocumentKind, input: string): DocumentResult {
  return checkDocument(DESCRIPTORS[kind], input);
}

export { CPF, isValidCPF, checkCpf } from "./cpf";
export { CNPJ, isValidCNPJ, checkCnpj } from "./cnpj";
export { PIS, isValidPIS, checkPis } from "./pis";
export {
  checkDocument,
  computeCheckDigits,
  isValidDocument,
  mod11,
  parseDigits,
  type DocumentDescriptor,
  type DocumentResult
} from "./checkDigits";
