import languages from "./languages.json"

export interface LanguageEntry {
  name: string
  code: string
}

const LANGUAGES: readonly LanguageEntry[] = languages

/**
 * Language names accepted as a dubbing target or source
 */
export const SUPPORTED_LANGUAGES: readonly string[] = LANGUAGES.map((entry) => entry.name)

/**
 * ISO-639-1 code for a language given by name or code, case-insensitive
 */
export function languageCode(language: string): string | undefined {
  const needle = language.trim().toLowerCase()
  return LANGUAGES.find((entry) => entry.name.toLowerCase() === needle || entry.code === needle)?.code
}

export function languageName(language: string): string {
  const code = languageCode(language)
  return LANGUAGES.find((entry) => entry.code === code)?.name ?? language
}
