export interface SpeechModelFeatures {
    custom_language_model: boolean;
    custom_acoustic_model?: boolean;
    speaker_labels: boolean;
    low_latency?: boolean;
}

/**
 * A speech-to-text recognition model.
 */
export interface SpeechModel {
    name: string;
    language: string;
    url: string;
    /** Sampling rate in Hz */
    rate: number;
    supported_features: SpeechModelFeatures;
    description: string;
}
