import FormData from 'form-data';
import { readFile } from 'fs/promises';
import path from 'path';
import { CustomModel } from '../../domain/entities/CustomModel';
import { Prompt, PromptMetadata } from '../../domain/entities/Prompt';
import { Pronunciation } from '../../domain/entities/Pronunciation';
import { Speaker, SpeakerCustomModel } from '../../domain/entities/Speaker';
import { Voice } from '../../domain/entities/Voice';
import { Word } from '../../domain/entities/Word';
import { FileReadError } from '../../domain/errors/WatsonError';
import {
    AudioSource,
    CreateCustomModelInput,
    GetVoiceOptions,
    ITextToSpeechClient,
    PronunciationOptions,
    SynthesisOptions,
    UpdateCustomModelInput,
} from '../../domain/ports/ITextToSpeechClient';
import { RequestOptions } from '../../domain/ports/ITokenProvider';
import { DEFAULT_LANGUAGE, Language } from '../../domain/services/Languages';
import { DEFAULT_PHONEME_FORMAT } from '../../domain/services/PhonemeFormats';
import { DEFAULT_VOICE, WatsonVoice } from '../../domain/services/WatsonVoices';
import * as operations from '../watson/operations/textToSpeech';
import { TokenSource, WatsonHttpClient } from '../watson/WatsonHttpClient';

export interface WatsonTextToSpeechClientOptions {
    /** Service instance URL, e.g. https://api.us-south.text-to-speech.watson.cloud.ibm.com/instances/<guid> */
    serviceUrl: string;
    /** Bearer token, or a provider such as IamAuthenticator */
    token: TokenSource;
    /** Default voice for synthesis and pronunciation */
    voice?: WatsonVoice;
    timeoutMs?: number;
    debug?: boolean;
}

/**
 * Watson Text to Speech client.
 *
 * Covers voices, custom models and their words and prompts, speaker models,
 * pronunciation, synthesis and user data deletion. The only state besides the
 * connection is the default voice.
 */
export class WatsonTextToSpeechClient implements ITextToSpeechClient {
    private readonly http: WatsonHttpClient;
    private currentVoice: WatsonVoice;

    constructor(options: WatsonTextToSpeechClientOptions) {
        this.http = new WatsonHttpClient({
            serviceUrl: options.serviceUrl,
            token: options.token,
            timeoutMs: options.timeoutMs,
            debug: options.debug,
            label: 'Watson TTS',
        });
        this.currentVoice = options.voice ?? DEFAULT_VOICE;
    }

    get voice(): WatsonVoice {
        return this.currentVoice;
    }

    setVoice(voice: WatsonVoice): void {
        this.currentVoice = voice;
    }

    async listVoices(options?: RequestOptions): Promise<Voice[]> {
        return this.http.execute(operations.listVoices(), options);
    }

    /**
     * Describes one voice. With a customization ID, the response also
     * carries that custom model.
     */
    async getVoice(voice: WatsonVoice, options: GetVoiceOptions = {}): Promise<Voice> {
        return this.http.execute(operations.getVoice(voice, options.customizationId), options);
    }

    async createCustomModel(input: CreateCustomModelInput, options?: RequestOptions): Promise<CustomModel> {
        return this.http.execute(
            operations.createCustomModel(input.name, input.language ?? DEFAULT_LANGUAGE, input.description),
            options
        );
    }

    async listCustomModels(language?: Language, options?: RequestOptions): Promise<CustomModel[]> {
        return this.http.execute(operations.listCustomModels(language), options);
    }

    async updateCustomModel(
        customizationId: string,
        input: UpdateCustomModelInput,
        options?: RequestOptions
    ): Promise<void> {
        return this.http.execute(operations.updateCustomModel(customizationId, input), options);
    }

    async getCustomModel(customizationId: string, options?: RequestOptions): Promise<CustomModel> {
        return this.http.execute(operations.getCustomModel(customizationId), options);
    }

    async deleteCustomModel(customizationId: string, options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.deleteCustomModel(customizationId), options);
    }

    async addCustomWords(customizationId: string, words: Word[], options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.addCustomWords(customizationId, words), options);
    }

    async listCustomWords(customizationId: string, options?: RequestOptions): Promise<Word[]> {
        return this.http.execute(operations.listCustomWords(customizationId), options);
    }

    async addCustomWord(customizationId: string, word: Word, options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.addCustomWord(customizationId, word), options);
    }

    async getCustomWord(customizationId: string, word: string, options?: RequestOptions): Promise<Word> {
        return this.http.execute(operations.getCustomWord(customizationId, word), options);
    }

    async deleteCustomWord(customizationId: string, word: string, options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.deleteCustomWord(customizationId, word), options);
    }

    async listCustomPrompts(customizationId: string, options?: RequestOptions): Promise<Prompt[]> {
        return this.http.execute(operations.listCustomPrompts(customizationId), options);
    }

    /**
     * Uploads a WAV recording of `metadata.prompt_text` as a prompt of the
     * custom model. The service processes the audio asynchronously; poll
     * getCustomPrompt until its status is `available`.
     */
    async addCustomPrompt(
        customizationId: string,
        promptId: string,
        metadata: PromptMetadata,
        audio: AudioSource,
        options?: RequestOptions
    ): Promise<Prompt> {
        const audioData = await readAudio(audio);

        const form = new FormData();
        form.append('metadata', JSON.stringify(metadata), { contentType: 'application/json' });
        form.append('file', audioData, {
            filename: typeof audio === 'string' ? path.basename(audio) : `${promptId}.wav`,
            contentType: 'audio/wav',
        });

        return this.http.execute(operations.addCustomPrompt(customizationId, promptId, form), options);
    }

    async getCustomPrompt(customizationId: string, promptId: string, options?: RequestOptions): Promise<Prompt> {
        return this.http.execute(operations.getCustomPrompt(customizationId, promptId), options);
    }

    async deleteCustomPrompt(customizationId: string, promptId: string, options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.deleteCustomPrompt(customizationId, promptId), options);
    }

    async listSpeakerModels(options?: RequestOptions): Promise<Speaker[]> {
        return this.http.execute(operations.listSpeakerModels(), options);
    }

    /**
     * Enrolls a speaker from a WAV sample and resolves with the new speaker ID.
     */
    async createSpeakerModel(speakerName: string, audio: AudioSource, options?: RequestOptions): Promise<string> {
        const audioData = await readAudio(audio);
        return this.http.execute(operations.createSpeakerModel(speakerName, audioData), options);
    }

    async getSpeakerModel(speakerId: string, options?: RequestOptions): Promise<SpeakerCustomModel[]> {
        return this.http.execute(operations.getSpeakerModel(speakerId), options);
    }

    async deleteSpeakerModel(speakerId: string, options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.deleteSpeakerModel(speakerId), options);
    }

    async getPronunciation(text: string, options: PronunciationOptions = {}): Promise<Pronunciation> {
        return this.http.execute(
            operations.getPronunciation(
                text,
                options.voice ?? this.currentVoice,
                options.format ?? DEFAULT_PHONEME_FORMAT,
                options.customizationId
            ),
            options
        );
    }

    /**
     * Synthesizes text to audio bytes in the requested format.
     */
    async synthesize(text: string, options: SynthesisOptions = {}): Promise<Buffer> {
        return this.http.execute(
            operations.synthesize(text, options.voice ?? this.currentVoice, options.format, options.customizationId),
            options
        );
    }

    /**
     * Deletes all data associated with a customer ID across the service.
     */
    async deleteUserData(customerId: string, options?: RequestOptions): Promise<void> {
        return this.http.execute(operations.deleteUserData(customerId), options);
    }
}

async function readAudio(audio: AudioSource): Promise<Buffer> {
    if (Buffer.isBuffer(audio)) {
        return audio;
    }
    try {
        return await readFile(audio);
    } catch (error) {
        throw new FileReadError(audio, error instanceof Error ? error.message : String(error));
    }
}
