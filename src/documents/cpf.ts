import { checkDocument, isValidDocument, type DocumentDescriptor } from "./checkDigits";

export const CPF: DocumentDescriptor = {
  kind: "CPF",
  length: 11,
  weights: [
    [10, 9, 8, 7, 6, 5, 4, 3, 2],
    [11, 10, 9, 8, 7, 6, 5, 4, 3, 2]
  ]
};

/**
 * Valida o CPF pelos dois dígitos verificadores.
 * @throws DocumentError se o número não tiver 11 dígitos após a limpeza.
 */
export function isValidCPF(cpf: string) {
  return isValidDocument(CPF, cpf);
}

export function checkCpf(cpf: string) {
  return checkDocument(CPF, cpf);
}
