/**
 * Speaker model enrolled from a voice sample.
 */
export interface Speaker {
    speaker_id: string;
    name: string;
}

/**
 * A prompt defined for a speaker within one custom model.
 */
export interface SpeakerPrompt {
    prompt: string;
    prompt_id: string;
    status: string;
    error?: string;
}

/**
 * A custom model in which a speaker has defined prompts.
 */
export interface SpeakerCustomModel {
    customization_id: string;
    prompts: SpeakerPrompt[];
}
