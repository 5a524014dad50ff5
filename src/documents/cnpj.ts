import { checkDocument, isValidDocument, type DocumentDescriptor } from "./checkDigits";

export const CNPJ: DocumentDescriptor = {
  kind: "CNPJ",
  length: 14,
  weights: [
    [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
    [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]
  ]
};

/**
 * Valida o CNPJ pelos dois dígitos verificadores.
 * @throws DocumentError se o número não tiver 14 dígitos após a limpeza.
 */
export function isValidCNPJ(cnpj: string) {
  return isValidDocument(CNPJ, cnpj);
}

export function checkCnpj(cnpj: string) {
  return checkDocument(CNPJ, cnpj);
}
