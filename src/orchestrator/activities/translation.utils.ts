/**
 * Prompt construction and response handling for per-segment translation
 */

/** Placeholder for segments with nothing to say; keeps subtitle timing intact */
export const BLANK_TEXT = "　"

export const TRANSLATION_ERROR_PREFIX = "[TRANSLATION_ERROR]"

export const FILLER_PHRASES = ["um", "uh", "so", "well", "you know", "i mean"] as const

const DEFAULT_CHARS_PER_SECOND = 14

// Characters a narrator reads per second; dense scripts need far fewer
const CHARS_PER_SECOND: Record<string, number> = {
  japanese: 5.68,
  chinese: 4.5,
  korean: 6.5,
}

export function charsPerSecondFor(language: string): number {
  return CHARS_PER_SECOND[language.trim().toLowerCase()] ?? DEFAULT_CHARS_PER_SECOND
}

export function maxCharactersFor(start: number, end: number, charsPerSecond: number): number {
  return Math.max(0, Math.floor((end - start) * charsPerSecond))
}

/**
 * True when the text is empty or made only of filler phrases
 */
export function isFillerOnly(text: string): boolean {
  let rest = text
    .toLowerCase()
    .replace(/[.,!?;:…-]+/g, " ")
    .replace(/\s+/g, " ")
    .trim()

  // Longest phrases first so "you know" is not read as "you" + "know"
  const phrases = [...FILLER_PHRASES].sort((a, b) => b.length - a.length)

  while (rest.length > 0) {
    const match = phrases.find((phrase) => rest === phrase || rest.startsWith(`${phrase} `))
    if (!match) {
      return false
    }
    rest = rest.slice(match.length).trim()
  }
  return true
}

export interface TranslationPromptInput {
  text: string
  sourceLanguage: string
  targetLanguage: string
  maxCharacters: number
  preserveTerms?: string[]
}

export interface TranslationPrompt {
  system: string
  user: string
}

export function buildTranslationPrompt(input: TranslationPromptInput): TranslationPrompt {
  const lines = [
    `You are a professional translator converting ${input.sourceLanguage} speech into ${input.targetLanguage} lines for text-to-speech narration.`,
    `Translate into clear, natural ${input.targetLanguage} suitable for dubbing. Keep it concise yet complete.`,
    "",
    `Your translation must fit within ${input.maxCharacters} characters. This is a strict limit.`,
    "Do not cut the translation off. If it runs long, rephrase it naturally to reduce length while keeping the meaning, so the result is a complete sentence.",
    "",
    'Omit filler words like "um", "uh" and "you know". If the input consists only of such words, return an empty response with no explanation.',
  ]

  const terms = (input.preserveTerms ?? []).filter((term) => term.trim().length > 0)
  if (terms.length > 0) {
    lines.push("", `Keep these terms exactly as written, do not translate them: ${terms.map((term) => `"${term}"`).join(", ")}.`)
  }

  lines.push("", "Return only the translated text on a single line. No line breaks, formatting or commentary.")

  return {
    system: lines.join("\n"),
    user: input.text,
  }
}

/**
 * Clean a model response into a single subtitle line
 */
export function normalizeTranslation(raw: string | null | undefined): string {
  let text = (raw ?? "").replace(/\s*\r?\n\s*/g, " ").trim()

  const quoted = text.match(/^["“「](.*)["”」]$/s)
  if (quoted) {
    text = quoted[1].trim()
  }

  return text.length > 0 ? text : BLANK_TEXT
}

export function fallbackTranslation(text: string): string {
  return isFillerOnly(text) ? BLANK_TEXT : `${TRANSLATION_ERROR_PREFIX} ${text}`
}

/**
 * Whether a translated line should be voiced and shown
 */
export function isSpeakable(text: string): boolean {
  return text.trim().length > 0 && !text.startsWith(TRANSLATION_ERROR_PREFIX)
}
