/**
 * Phonetic alphabets the pronunciation endpoint can answer in.
 */
export type PhonemeFormat = 'ibm' | 'ipa';

export const DEFAULT_PHONEME_FORMAT: PhonemeFormat = 'ipa';
