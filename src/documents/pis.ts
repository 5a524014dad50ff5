import { checkDocument, isValidDocument, type DocumentDescriptor } from "./checkDigits";

// Um único dígito verificador sobre os 10 primeiros dígitos.
export const PIS: DocumentDescriptor = {
  kind: "PIS",
  length: 11,
  weights: [[3, 2, 9, 8, 7, 6, 5, 4, 3, 2]]
};

export function isValidPIS(pis: string) {
  return isValidDocument(PIS, pis);
}

export function checkPis(pis: string) {
  return checkDocument(PIS, pis);
}
