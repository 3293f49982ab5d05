/**
 * A custom prompt: a (text, audio) pair that tunes synthesis of a phrase.
 */
export interface Prompt {
    prompt: string;
    prompt_id: string;
    /** processing | available | failed */
    status?: string;
    error?: string;
    speaker_id?: string;
}

/**
 * Metadata sent with a prompt's audio when it is added.
 */
export interface PromptMetadata {
    prompt_text: string;
    speaker_id?: string;
}
