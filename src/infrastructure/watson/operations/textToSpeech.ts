import FormData from 'form-data';
import { CustomModel } from '../../../domain/entities/CustomModel';
import { Prompt } from '../../../domain/entities/Prompt';
import { Pronunciation } from '../../../domain/entities/Pronunciation';
import { Speaker, SpeakerCustomModel } from '../../../domain/entities/Speaker';
import { Voice } from '../../../domain/entities/Voice';
import { Word } from '../../../domain/entities/Word';
import { AudioFormat, formatAudioMimeType } from '../../../domain/services/AudioFormats';
import { Language, languageCode } from '../../../domain/services/Languages';
import { PhonemeFormat } from '../../../domain/services/PhonemeFormats';
import { voiceId, WatsonVoice } from '../../../domain/services/WatsonVoices';
import { decodeWith, validators } from '../schemas';
import { emptyResponse, WatsonOperation } from '../WatsonOperation';

/**
 * Request descriptors for the Text to Speech service, one builder per
 * endpoint. Paths are relative to the service instance URL.
 */

const CUSTOMIZATION = 'v1/customizations/{customization_id}';

export function listVoices(): WatsonOperation<Voice[]> {
    const decode = decodeWith(validators.voices, 'listVoices');
    return {
        name: 'listVoices',
        method: 'GET',
        path: 'v1/voices',
        success: [200],
        errors: [406, 415, 500, 503],
        response: { kind: 'json', decode: (data) => decode(data).voices },
    };
}

export function getVoice(voice: WatsonVoice, customizationId?: string): WatsonOperation<Voice> {
    return {
        name: 'getVoice',
        method: 'GET',
        path: 'v1/voices/{voice_id}',
        pathParams: { voice_id: voiceId(voice) },
        query: [['customization_id', customizationId]],
        success: [200],
        errors: [304, 400, 401, 404, 406, 415, 500, 503],
        resource: customizationId !== undefined ? { id: customizationId, on: [401] } : undefined,
        response: { kind: 'json', decode: decodeWith(validators.voice, 'getVoice') },
    };
}

export function createCustomModel(name: string, language: Language, description?: string): WatsonOperation<CustomModel> {
    return {
        name: 'createCustomModel',
        method: 'POST',
        path: 'v1/customizations',
        payload: { kind: 'json', value: { name, language: languageCode(language), description } },
        success: [200, 201],
        errors: [400, 500, 503],
        response: { kind: 'json', decode: decodeWith(validators.customModel, 'createCustomModel') },
    };
}

export function listCustomModels(language?: Language): WatsonOperation<CustomModel[]> {
    const decode = decodeWith(validators.customModels, 'listCustomModels');
    return {
        name: 'listCustomModels',
        method: 'GET',
        path: 'v1/customizations',
        query: [['language', language ? languageCode(language) : undefined]],
        success: [200],
        errors: [400, 401, 500, 503],
        response: { kind: 'json', decode: (data) => decode(data).customizations },
    };
}

export function updateCustomModel(
    customizationId: string,
    update: { name?: string; description?: string; words?: Word[] }
): WatsonOperation<void> {
    return {
        name: 'updateCustomModel',
        method: 'POST',
        path: CUSTOMIZATION,
        pathParams: { customization_id: customizationId },
        payload: { kind: 'json', value: update },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: emptyResponse,
    };
}

export function getCustomModel(customizationId: string): WatsonOperation<CustomModel> {
    return {
        name: 'getCustomModel',
        method: 'GET',
        path: CUSTOMIZATION,
        pathParams: { customization_id: customizationId },
        success: [200],
        errors: [304, 400, 401, 500, 503],
        resource: { id: customizationId, on: [400, 401] },
        response: { kind: 'json', decode: decodeWith(validators.customModel, 'getCustomModel') },
    };
}

export function deleteCustomModel(customizationId: string): WatsonOperation<void> {
    return {
        name: 'deleteCustomModel',
        method: 'DELETE',
        path: CUSTOMIZATION,
        pathParams: { customization_id: customizationId },
        success: [204],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [400, 401] },
        response: emptyResponse,
    };
}

export function addCustomWords(customizationId: string, words: Word[]): WatsonOperation<void> {
    return {
        name: 'addCustomWords',
        method: 'POST',
        path: `${CUSTOMIZATION}/words`,
        pathParams: { customization_id: customizationId },
        payload: { kind: 'json', value: { words } },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: emptyResponse,
    };
}

export function listCustomWords(customizationId: string): WatsonOperation<Word[]> {
    const decode = decodeWith(validators.words, 'listCustomWords');
    return {
        name: 'listCustomWords',
        method: 'GET',
        path: `${CUSTOMIZATION}/words`,
        pathParams: { customization_id: customizationId },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: { kind: 'json', decode: (data) => decode(data).words },
    };
}

export function addCustomWord(customizationId: string, word: Word): WatsonOperation<void> {
    return {
        name: 'addCustomWord',
        method: 'PUT',
        path: `${CUSTOMIZATION}/words/{word}`,
        pathParams: { customization_id: customizationId, word: word.word },
        payload: {
            kind: 'json',
            value: { translation: word.translation, part_of_speech: word.part_of_speech },
        },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: emptyResponse,
    };
}

export function getCustomWord(customizationId: string, word: string): WatsonOperation<Word> {
    const decode = decodeWith(validators.translation, 'getCustomWord');
    return {
        name: 'getCustomWord',
        method: 'GET',
        path: `${CUSTOMIZATION}/words/{word}`,
        pathParams: { customization_id: customizationId, word },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: {
            kind: 'json',
            decode: (data) => {
                const { translation, part_of_speech } = decode(data);
                return part_of_speech === undefined ? { word, translation } : { word, translation, part_of_speech };
            },
        },
    };
}

export function deleteCustomWord(customizationId: string, word: string): WatsonOperation<void> {
    return {
        name: 'deleteCustomWord',
        method: 'DELETE',
        path: `${CUSTOMIZATION}/words/{word}`,
        pathParams: { customization_id: customizationId, word },
        success: [204],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [400, 401] },
        response: emptyResponse,
    };
}

export function listCustomPrompts(customizationId: string): WatsonOperation<Prompt[]> {
    const decode = decodeWith(validators.prompts, 'listCustomPrompts');
    return {
        name: 'listCustomPrompts',
        method: 'GET',
        path: `${CUSTOMIZATION}/prompts`,
        pathParams: { customization_id: customizationId },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: { kind: 'json', decode: (data) => decode(data).prompts },
    };
}

/**
 * The form must already carry the `metadata` and `file` parts.
 */
export function addCustomPrompt(customizationId: string, promptId: string, form: FormData): WatsonOperation<Prompt> {
    return {
        name: 'addCustomPrompt',
        method: 'POST',
        path: `${CUSTOMIZATION}/prompts/{prompt_id}`,
        pathParams: { customization_id: customizationId, prompt_id: promptId },
        payload: { kind: 'multipart', form },
        success: [201],
        errors: [400, 401, 415, 500, 503],
        resource: { id: customizationId, on: [401] },
        response: { kind: 'json', decode: decodeWith(validators.prompt, 'addCustomPrompt') },
    };
}

export function getCustomPrompt(customizationId: string, promptId: string): WatsonOperation<Prompt> {
    return {
        name: 'getCustomPrompt',
        method: 'GET',
        path: `${CUSTOMIZATION}/prompts/{prompt_id}`,
        pathParams: { customization_id: customizationId, prompt_id: promptId },
        success: [200],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [400, 401] },
        response: { kind: 'json', decode: decodeWith(validators.prompt, 'getCustomPrompt') },
    };
}

export function deleteCustomPrompt(customizationId: string, promptId: string): WatsonOperation<void> {
    return {
        name: 'deleteCustomPrompt',
        method: 'DELETE',
        path: `${CUSTOMIZATION}/prompts/{prompt_id}`,
        pathParams: { customization_id: customizationId, prompt_id: promptId },
        success: [204],
        errors: [400, 401, 500, 503],
        resource: { id: customizationId, on: [400, 401] },
        response: emptyResponse,
    };
}

export function listSpeakerModels(): WatsonOperation<Speaker[]> {
    const decode = decodeWith(validators.speakers, 'listSpeakerModels');
    return {
        name: 'listSpeakerModels',
        method: 'GET',
        path: 'v1/speakers',
        success: [200],
        errors: [400, 500, 503],
        response: { kind: 'json', decode: (data) => decode(data).speakers },
    };
}

export function createSpeakerModel(speakerName: string, audio: Buffer): WatsonOperation<string> {
    const decode = decodeWith(validators.speakerCreated, 'createSpeakerModel');
    return {
        name: 'createSpeakerModel',
        method: 'POST',
        path: 'v1/speakers',
        query: [['speaker_name', speakerName]],
        payload: { kind: 'audio', data: audio, contentType: 'audio/wav' },
        success: [201],
        errors: [400, 401, 415, 500, 503],
        response: { kind: 'json', decode: (data) => decode(data).speaker_id },
    };
}

export function getSpeakerModel(speakerId: string): WatsonOperation<SpeakerCustomModel[]> {
    const decode = decodeWith(validators.speakerCustomModels, 'getSpeakerModel');
    return {
        name: 'getSpeakerModel',
        method: 'GET',
        path: 'v1/speakers/{speaker_id}',
        pathParams: { speaker_id: speakerId },
        success: [200],
        errors: [304, 400, 401, 500, 503],
        resource: { id: speakerId, on: [401] },
        response: { kind: 'json', decode: (data) => decode(data).customizations },
    };
}

export function deleteSpeakerModel(speakerId: string): WatsonOperation<void> {
    return {
        name: 'deleteSpeakerModel',
        method: 'DELETE',
        path: 'v1/speakers/{speaker_id}',
        pathParams: { speaker_id: speakerId },
        success: [204],
        errors: [400, 401, 500, 503],
        resource: { id: speakerId, on: [400, 401] },
        response: emptyResponse,
    };
}

export function getPronunciation(
    text: string,
    voice: WatsonVoice,
    format: PhonemeFormat,
    customizationId?: string
): WatsonOperation<Pronunciation> {
    return {
        name: 'getPronunciation',
        method: 'GET',
        path: 'v1/pronunciation',
        query: [
            ['text', text],
            ['voice', voiceId(voice)],
            ['format', format],
            ['customization_id', customizationId],
        ],
        success: [200],
        errors: [304, 400, 401, 404, 406, 500, 503],
        resource: customizationId !== undefined ? { id: customizationId, on: [401] } : undefined,
        response: { kind: 'json', decode: decodeWith(validators.pronunciation, 'getPronunciation') },
    };
}

/**
 * With no format the `accept` parameter is left out and the service
 * answers with its own default (audio/ogg;codecs=opus).
 */
export function synthesize(
    text: string,
    voice: WatsonVoice,
    format?: AudioFormat,
    customizationId?: string
): WatsonOperation<Buffer> {
    const accept = format ? formatAudioMimeType(format) : undefined;
    return {
        name: 'synthesize',
        method: 'GET',
        path: 'v1/synthesize',
        query: [
            ['text', text],
            ['voice', voiceId(voice)],
            ['accept', accept],
            ['customization_id', customizationId],
        ],
        success: [200],
        errors: [400, 404, 406, 415, 500, 503],
        response: { kind: 'binary', accept, decode: (audio) => audio },
    };
}

export function deleteUserData(customerId: string): WatsonOperation<void> {
    return {
        name: 'deleteUserData',
        method: 'DELETE',
        path: 'v1/user_data/{customer_id}',
        pathParams: { customer_id: customerId },
        success: [204],
        errors: [400, 500, 503],
        response: emptyResponse,
    };
}
