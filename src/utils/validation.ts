import type { z } from "zod";

const CAMPO_PT: Record<string, string> = {
  cpf: "CPF",
  cnpj: "CNPJ",
  pis: "PIS",
  documento: "Documento"
};

/**
 * Converte erros do Zod em uma única mensagem em português.
 */
export function formatZodError(error: z.ZodError): string {
  const mensagens = error.issues.map((issue) => {
    const campo = issue.path[0] ? CAMPO_PT[String(issue.path[0])] || String(issue.path[0]) : "";
    const pref = campo ? `${campo}: ` : "";

    switch (issue.code) {
      case "invalid_type":
        if (issue.received === "undefined") return `${pref}obrigatório`;
        return `${pref}tipo inválido`;
      default:
        // mensagens de DocumentError terminam com ponto; o join já pontua
        return pref + (issue.message.replace(/\.$/, "") || "inválido");
    }
  });
  return mensagens.join(". ") || "Dados inválidos";
}
