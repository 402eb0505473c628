export const LANGUAGES = [
  { label: 'English (US)', code: 'en-US' },
  { label: 'English (UK)', code: 'en-GB' },
  { label: 'Chinese (Mandarin)', code: 'zh' },
  { label: 'Spanish', code: 'es' },
  { label: 'French', code: 'fr' },
  { label: 'German', code: 'de' },
  { label: 'Japanese', code: 'ja' },
  { label: 'Korean', code: 'ko' },
  { label: 'Portuguese (BR)', code: 'pt-BR' },
  { label: 'Hindi', code: 'hi' },
] as const;

export type LanguageCode = typeof LANGUAGES[number]['code'];

export const LANGUAGE_CODES: readonly LanguageCode[] = LANGUAGES.map((language) => language.code);

