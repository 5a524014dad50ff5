export type DocumentKind = "CPF" | "CNPJ" | "PIS";

export type DocumentErrorCode = "INVALID_LENGTH" | "INVALID_FORMAT";

export class DocumentError extends Error {
  readonly code: DocumentErrorCode;
  readonly kind: DocumentKind;
  readonly expected: number;
  readonly received: number;

  constructor(code: DocumentErrorCode, kind: DocumentKind, expected: number, received: number) {
    super(
      code === "INVALID_LENGTH"
        ? `Tamanho do documento incorreto: esperado ${expected} dígitos, recebido ${received}.`
        : "Documento contém caracteres não numéricos."
    );
    this.name = "DocumentError";
    this.code = code;
    this.kind = kind;
    this.expected = expected;
    this.received = received;
  }
}

export function isDocumentError(err: unknown): err is DocumentError {
  return err instanceof DocumentError;
}
