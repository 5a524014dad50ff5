import type { DocumentError, DocumentErrorCode } from "../errors";

/**
 * Formato padrão dos resultados de validação.
 * Erro sempre traz success: false, o código em `error` e a mensagem em `description`.
 */
export type ErrorResult = {
  success: false;
  error: DocumentErrorCode;
  description: string;
};

export type SuccessResult<T> = { success: true; data: T };

export type Result<T> = SuccessResult<T> | ErrorResult;

export function errorResult(err: DocumentError): ErrorResult {
  return {
    success: false,
    error: err.code,
    description: err.message
  };
}

export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}
