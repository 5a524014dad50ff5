export {
  CPF,
  CNPJ,
  PIS,
  DESCRIPTORS,
  checkCnpj,
  checkCpf,
  checkDocument,
  checkPis,
  computeCheckDigits,
  isValidCNPJ,
  isValidCPF,
  isValidDocument,
  isValidPIS,
  mod11,
  parseDigits,
  validateDocument
} from "./documents";
export type { DocumentDescriptor, DocumentResult } from "./documents";
export { cnpjSchema, cpfSchema, documentSchema, pisSchema } from "./documents/schemas";
export { DocumentError, isDocumentError } from "./errors";
export type { DocumentErrorCode, DocumentKind } from "./errors";
export { errorResult, successResult } from "./utils/response";
export type { ErrorResult, Result, SuccessResult } from "./utils/response";
export { clearSymbols } from "./utils/symbols";
export {
  clearAccentedCharacters,
  clearSpecialCharacters,
  getAfter,
  getAfterOrEmpty,
  getUntil,
  getUntilOrEmpty
} from "./utils/text";
export { formatZodError } from "./utils/validation";
export { env, loadEnv } from "./config";
export type { Env } from "./config";
export { createLogger, logger } from "./logger";
