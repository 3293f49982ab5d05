/**
 * Phonetic pronunciation of a word in IPA or IBM SPR notation.
 */
export interface Pronunciation {
    pronunciation: string;
}
