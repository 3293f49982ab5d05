/**
 * A word and its sounds-like or phonetic translation in a custom model.
 */
export interface Word {
    word: string;
    translation: string;
    /** Japanese only */
    part_of_speech?: string;
}

/**
 * The translation of a single word, as returned when querying one word.
 */
export interface Translation {
    translation: string;
    part_of_speech?: string;
}
