import { clearSymbols } from "./symbols";

function isBlank(text: string) {
  return text.trim() === "";
}

function indexAfterStart(text: string, marker: string) {
  if (isBlank(text)) return -1;
  const index = text.indexOf(marker);
  // Marcador na primeira posição não conta.
  return index > 0 ? index : -1;
}

/**
 * Texto até o primeiro `stopAt`, ou string vazia se não encontrar.
 */
export function getUntilOrEmpty(text: string, stopAt: string) {
  const index = indexAfterStart(text, stopAt);
  return index > 0 ? text.slice(0, index) : "";
}

/**
 * Texto até o primeiro `stopAt`; sem ocorrência, devolve o texto original.
 */
export function getUntil(text: string, stopAt: string) {
  const index = indexAfterStart(text, stopAt);
  return index > 0 ? text.slice(0, index) : text;
}

/**
 * Texto a partir do primeiro `startAt` (inclusive), ou string vazia.
 */
export function getAfterOrEmpty(text: string, startAt: string) {
  const index = indexAfterStart(text, startAt);
  return index > 0 ? text.slice(index) : "";
}

export function getAfter(text: string, startAt: string) {
  const index = indexAfterStart(text, startAt);
  return index > 0 ? text.slice(index) : text;
}

/**
 * Troca letras acentuadas pela letra base (ç → c, ã → a, Ñ → N).
 * Só os diacríticos latinos saem; outras escritas ficam intactas.
 */
export function clearAccentedCharacters(value: string) {
  return value.normalize("NFD").replace(/[\u0300-\u036f]/g, "").normalize("NFC");
}

export function clearSpecialCharacters(value: string) {
  return clearSymbols(clearAccentedCharacters(value));
}
