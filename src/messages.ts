/**
 * User-facing texts returned by the tools.
 *
 * The upstream service and its users are Czech, so are the texts.
 */

export const MESSAGES = {
  missingToken: "Chyba: MM_API_TOKEN není nastaven v prostředí serveru.",
  unknownError: "Nastala neznámá chyba",
  unexpectedFormat: "Neočekávaný formát odpovědi z API",
  noSuggestions: "Nebyla nalezena žádná data pro tento dotaz.",
  noVolumeData: "Nebyla nalezena žádná data pro toto klíčové slovo.",
} as const;

export const LABELS = {
  keyword: "Klíčové slovo",
  searchVolume: "Hledanost",
  cpc: "CPC",
  difficulty: "Obtížnost",
  serpFeatures: "SERP features",
  yoyChange: "Meziroční změna",
  peakMonth: "Nejsilnější měsíc",
  monthlyVolume: "Měsíční hledanost",
  month: "Měsíc",
} as const;

export function unsupportedLanguage(
  value: string,
  supported: readonly string[]
): string {
  return `Nepodporovaný jazyk: ${value}. Podporované jazyky jsou: ${supported.join(", ")}`;
}

export function unsupportedSuggestionsType(
  value: string,
  supported: readonly string[]
): string {
  return `Nepodporovaný typ návrhů: ${value}. Podporované typy jsou: ${supported.join(", ")}`;
}

export function httpError(status: number, body: string): string {
  return `HTTP chyba: ${status} - ${body}`;
}

export function requestError(cause: string): string {
  return `Obecná chyba při volání API: ${cause}`;
}
