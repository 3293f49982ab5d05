import Ajv, { ValidateFunction } from 'ajv';
import { AccessToken } from '../../domain/entities/AccessToken';
import { CustomModel } from '../../domain/entities/CustomModel';
import { Prompt } from '../../domain/entities/Prompt';
import { Pronunciation } from '../../domain/entities/Pronunciation';
import { Speaker, SpeakerCustomModel } from '../../domain/entities/Speaker';
import { SpeechModel } from '../../domain/entities/SpeechModel';
import { Voice } from '../../domain/entities/Voice';
import { Translation, Word } from '../../domain/entities/Word';
import { InvalidResponseError } from '../../domain/errors/WatsonError';
import schemas from './schemas.json';

/**
 * Response validators for every record the services return.
 * Record schemas live in schemas.json; list envelopes are built here.
 */
const ajv = new Ajv({ allErrors: true });
ajv.addSchema(schemas);

function compileRecord<T>(ref: string): ValidateFunction<T> {
    return ajv.compile<T>({ $ref: ref });
}

function compileEnvelope<K extends string, T>(key: K, ref: string): ValidateFunction<Record<K, T[]>> {
    return ajv.compile<Record<K, T[]>>({
        type: 'object',
        required: [key],
        properties: {
            [key]: { type: 'array', items: { $ref: ref } },
        },
    });
}

export const validators = {
    accessToken: compileRecord<AccessToken>('accessToken'),
    voice: compileRecord<Voice>('voice'),
    voices: compileEnvelope<'voices', Voice>('voices', 'voice'),
    customModel: compileRecord<CustomModel>('customModel'),
    customModels: compileEnvelope<'customizations', CustomModel>('customizations', 'customModel'),
    words: compileEnvelope<'words', Word>('words', 'word'),
    translation: compileRecord<Translation>('translation'),
    prompt: compileRecord<Prompt>('prompt'),
    prompts: compileEnvelope<'prompts', Prompt>('prompts', 'prompt'),
    speakers: compileEnvelope<'speakers', Speaker>('speakers', 'speaker'),
    speakerCustomModels: compileEnvelope<'customizations', SpeakerCustomModel>('customizations', 'speakerCustomModel'),
    speakerCreated: ajv.compile<{ speaker_id: string }>({
        type: 'object',
        required: ['speaker_id'],
        properties: { speaker_id: { type: 'string' } },
    }),
    pronunciation: compileRecord<Pronunciation>('pronunciation'),
    speechModel: compileRecord<SpeechModel>('speechModel'),
    speechModels: compileEnvelope<'models', SpeechModel>('models', 'speechModel'),
};

/**
 * Builds a decoder that returns the payload typed as T, or throws
 * InvalidResponseError listing every schema violation.
 */
export function decodeWith<T>(validate: ValidateFunction<T>, operation: string): (data: unknown) => T {
    return (data: unknown): T => {
        if (validate(data)) {
            return data;
        }
        throw new InvalidResponseError(operation, describeValidationErrors(validate));
    };
}

function describeValidationErrors(validate: ValidateFunction): string[] {
    const errors = validate.errors ?? [];
    if (errors.length === 0) {
        return ['payload is invalid'];
    }
    return errors.map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
}
