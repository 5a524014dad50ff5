import { DocumentError, isDocumentError, type DocumentKind } from "../errors";
import { errorResult, successResult, type Result } from "../utils/response";
import { clearSymbols } from "../utils/symbols";

export type DocumentDescriptor = {
  kind: DocumentKind;
  length: number;
  /** Uma tabela de pesos por dígito verificador, na ordem de cálculo. */
  weights: readonly (readonly number[])[];
};

export type DocumentResult = Result<boolean>;

export function mod11(digits: readonly number[], weights: readonly number[]) {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) sum += digits[i] * weights[i];
  const rest = sum % 11;
  return rest < 2 ? 0 : 11 - rest;
}

/**
 * Calcula os dígitos verificadores a partir da base (sem os dígitos finais).
 * Cada dígito calculado entra na sequência usada pela tabela seguinte.
 */
export function computeCheckDigits(descriptor: DocumentDescriptor, baseDigits: readonly number[]) {
  const sequence = [...baseDigits];
  const computed: number[] = [];
  for (const weights of descriptor.weights) {
    const digit = mod11(sequence, weights);
    computed.push(digit);
    sequence.push(digit);
  }
  return computed;
}

export function parseDigits(descriptor: DocumentDescriptor, input: string) {
  const normalized = clearSymbols(input);
  if (normalized.length !== descriptor.length) {
    throw new DocumentError("INVALID_LENGTH", descriptor.kind, descriptor.length, normalized.length);
  }
  if (!/^[0-9]+$/.test(normalized)) {
    throw new DocumentError("INVALID_FORMAT", descriptor.kind, descriptor.length, normalized.length);
  }
  return Array.from(normalized, Number);
}

/**
 * Valida o documento pelo(s) dígito(s) verificador(es).
 * Lança DocumentError quando o tamanho ou o formato estão errados.
 */
export function isValidDocument(descriptor: DocumentDescriptor, input: string) {
  const digits = parseDigits(descriptor, input);
  const baseLength = descriptor.length - descriptor.weights.length;
  const expected = computeCheckDigits(descriptor, digits.slice(0, baseLength));
  return expected.every((digit, i) => digits[baseLength + i] === digit);
}

export function checkDocument(descriptor: DocumentDescriptor, input: string): DocumentResult {
  try {
    return successResult(isValidDocument(descriptor, input));
  } catch (err) {
    if (isDocumentError(err)) return errorResult(err);
    throw err;
  }
}
