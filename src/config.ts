import "dotenv/config";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = z.object({
  NODE_ENV: z.string().min(1).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

// Na carga do módulo, valor fora do esquema volta ao padrão.
const moduleEnvSchema = z.object({
  NODE_ENV: envSchema.shape.NODE_ENV.catch("development"),
  LOG_LEVEL: envSchema.shape.LOG_LEVEL.catch("info")
});

const HINTS: Record<string, string> = {
  NODE_ENV: "NODE_ENV não pode ser vazio.",
  LOG_LEVEL: `LOG_LEVEL aceita: ${LOG_LEVELS.join(", ")}.`
};

/**
 * Leitura estrita: variável inválida é reportada no stderr e o ZodError é relançado.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const result = envSchema.safeParse(source);
  if (result.success) return result.data;

  const invalid = result.error.issues.map((i) => i.path.join(".")).filter(Boolean);
  const hints = invalid.map((key) => HINTS[key]).filter(Boolean);
  // eslint-disable-next-line no-console
  console.error(
    "\n❌ Variáveis de ambiente inválidas: " + invalid.join(", ") + "\n" + hints.map((h) => `   ${h}\n`).join("")
  );
  throw result.error;
}

export const env = moduleEnvSchema.parse(process.env);

export type Env = typeof env;
