import { CustomModel } from '../entities/CustomModel';
import { Prompt, PromptMetadata } from '../entities/Prompt';
import { Pronunciation } from '../entities/Pronunciation';
import { Speaker, SpeakerCustomModel } from '../entities/Speaker';
import { Voice } from '../entities/Voice';
import { Word } from '../entities/Word';
import { AudioFormat } from '../services/AudioFormats';
import { Language } from '../services/Languages';
import { PhonemeFormat } from '../services/PhonemeFormats';
import { WatsonVoice } from '../services/WatsonVoices';
import { RequestOptions } from './ITokenProvider';

/**
 * An upload payload: a path to read from disk, or the bytes themselves.
 */
export type AudioSource = string | Buffer;

export interface CreateCustomModelInput {
    name: string;
    /** Defaults to en-US */
    language?: Language;
    description?: string;
}

export interface UpdateCustomModelInput {
    name?: string;
    description?: string;
    words?: Word[];
}

export interface PronunciationOptions extends RequestOptions {
    /** Falls back to the client's current voice */
    voice?: WatsonVoice;
    /** Defaults to ipa */
    format?: PhonemeFormat;
    customizationId?: string;
}

export interface SynthesisOptions extends RequestOptions {
    /** Falls back to the client's current voice */
    voice?: WatsonVoice;
    /** Omitted from the request when unset; the service then answers in audio/ogg;codecs=opus */
    format?: AudioFormat;
    customizationId?: string;
}

export interface GetVoiceOptions extends RequestOptions {
    customizationId?: string;
}

/**
 * ITextToSpeechClient - Port for the Watson Text to Speech service.
 * Implementations: WatsonTextToSpeechClient
 */
export interface ITextToSpeechClient {
    readonly voice: WatsonVoice;
    setVoice(voice: WatsonVoice): void;

    listVoices(options?: RequestOptions): Promise<Voice[]>;
    getVoice(voice: WatsonVoice, options?: GetVoiceOptions): Promise<Voice>;

    createCustomModel(input: CreateCustomModelInput, options?: RequestOptions): Promise<CustomModel>;
    listCustomModels(language?: Language, options?: RequestOptions): Promise<CustomModel[]>;
    updateCustomModel(customizationId: string, input: UpdateCustomModelInput, options?: RequestOptions): Promise<void>;
    getCustomModel(customizationId: string, options?: RequestOptions): Promise<CustomModel>;
    deleteCustomModel(customizationId: string, options?: RequestOptions): Promise<void>;

    addCustomWords(customizationId: string, words: Word[], options?: RequestOptions): Promise<void>;
    listCustomWords(customizationId: string, options?: RequestOptions): Promise<Word[]>;
    addCustomWord(customizationId: string, word: Word, options?: RequestOptions): Promise<void>;
    getCustomWord(customizationId: string, word: string, options?: RequestOptions): Promise<Word>;
    deleteCustomWord(customizationId: string, word: string, options?: RequestOptions): Promise<void>;

    listCustomPrompts(customizationId: string, options?: RequestOptions): Promise<Prompt[]>;
    addCustomPrompt(
        customizationId: string,
        promptId: string,
        metadata: PromptMetadata,
        audio: AudioSource,
        options?: RequestOptions
    ): Promise<Prompt>;
    getCustomPrompt(customizationId: string, promptId: string, options?: RequestOptions): Promise<Prompt>;
    deleteCustomPrompt(customizationId: string, promptId: string, options?: RequestOptions): Promise<void>;

    listSpeakerModels(options?: RequestOptions): Promise<Speaker[]>;
    createSpeakerModel(speakerName: string, audio: AudioSource, options?: RequestOptions): Promise<string>;
    getSpeakerModel(speakerId: string, options?: RequestOptions): Promise<SpeakerCustomModel[]>;
    deleteSpeakerModel(speakerId: string, options?: RequestOptions): Promise<void>;

    getPronunciation(text: string, options?: PronunciationOptions): Promise<Pronunciation>;
    synthesize(text: string, options?: SynthesisOptions): Promise<Buffer>;

    deleteUserData(customerId: string, options?: RequestOptions): Promise<void>;
}
