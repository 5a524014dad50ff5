// - _ . , \ / | ~ # $ % & @ " ' * = + ª º > < : ; ? !
const SYMBOLS = /[-_.,\\/|~#$%&@"'*=+ªº><:;?!]/g;

/**
 * Remove símbolos e pontuação (após aparar espaços nas pontas).
 * Espaços internos, letras e acentos são mantidos.
 */
export function clearSymbols(value: string) {
  return value.trim().replace(SYMBOLS, "");
}
