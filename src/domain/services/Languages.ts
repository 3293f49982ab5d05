/**
 * Languages a text-to-speech custom model can be created for.
 */
export const LANGUAGE_CODES = {
    ArMs: 'ar-MS',
    CsCz: 'cs-CZ',
    DeDe: 'de-DE',
    EnAu: 'en-AU',
    EnGb: 'en-GB',
    EnUs: 'en-US',
    EsEs: 'es-ES',
    EsLa: 'es-LA',
    EsUs: 'es-US',
    FrCa: 'fr-CA',
    FrFr: 'fr-FR',
    ItIt: 'it-IT',
    JaJp: 'ja-JP',
    KoKr: 'ko-KR',
    NlBe: 'nl-BE',
    NlNl: 'nl-NL',
    PtBr: 'pt-BR',
    SvSe: 'sv-SE',
    ZhCn: 'zh-CN',
} as const;

export type Language = keyof typeof LANGUAGE_CODES;
export type LanguageCode = (typeof LANGUAGE_CODES)[Language];

export const DEFAULT_LANGUAGE: Language = 'EnUs';

export function languageCode(language: Language = DEFAULT_LANGUAGE): LanguageCode {
    return LANGUAGE_CODES[language];
}
