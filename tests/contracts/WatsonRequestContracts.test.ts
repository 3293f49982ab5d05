/**
 * Contract tests for the request bodies sent to Text to Speech.
 *
 * Each builder's JSON payload is checked against the shape the service
 * documents, without making any request.
 */

import Ajv from 'ajv';
import {
    addCustomWord,
    addCustomWords,
    createCustomModel,
    updateCustomModel,
} from '../../src/infrastructure/watson/operations/textToSpeech';
import { RequestPayload } from '../../src/infrastructure/watson/WatsonOperation';

const ajv = new Ajv({ allErrors: true });

function jsonBody(payload: RequestPayload | undefined): unknown {
    if (!payload || payload.kind !== 'json') {
        throw new Error('expected a JSON payload');
    }
    // What actually goes over the wire
    return JSON.parse(JSON.stringify(payload.value));
}

const WORD_SCHEMA = {
    type: 'object',
    properties: {
        word: { type: 'string', minLength: 1 },
        translation: { type: 'string', minLength: 1 },
        part_of_speech: { type: 'string' },
    },
    required: ['word', 'translation'],
    additionalProperties: false,
};

// =============================================================================
// CREATE CUSTOM MODEL
// =============================================================================

const CREATE_MODEL_SCHEMA = {
    type: 'object',
    properties: {
        name: { type: 'string', minLength: 1 },
        language: { type: 'string', pattern: '^[a-z]{2}-[A-Z]{2}$' },
        description: { type: 'string' },
    },
    required: ['name'],
    additionalProperties: false,
};

describe('Create custom model contract', () => {
    const validate = ajv.compile(CREATE_MODEL_SCHEMA);

    test('should send name, language code and description', () => {
        const body = jsonBody(createCustomModel('Tech terms', 'EsLa', 'Acronyms').payload);
        expect(validate(body)).toBe(true);
        expect(body).toEqual({ name: 'Tech terms', language: 'es-LA', description: 'Acronyms' });
    });

    test('should leave out an absent description', () => {
        const body = jsonBody(createCustomModel('Tech terms', 'EnUs').payload);
        expect(validate(body)).toBe(true);
        expect(body).toEqual({ name: 'Tech terms', language: 'en-US' });
    });
});

// =============================================================================
// UPDATE CUSTOM MODEL
// =============================================================================

const UPDATE_MODEL_SCHEMA = {
    type: 'object',
    properties: {
        name: { type: 'string' },
        description: { type: 'string' },
        words: { type: 'array', items: WORD_SCHEMA },
    },
    additionalProperties: false,
};

describe('Update custom model contract', () => {
    const validate = ajv.compile(UPDATE_MODEL_SCHEMA);

    test('should accept a full update', () => {
        const body = jsonBody(
            updateCustomModel('cust-1', {
                name: 'Renamed',
                description: 'Updated',
                words: [{ word: 'NCAA', translation: 'N C double A' }],
            }).payload
        );
        expect(validate(body)).toBe(true);
    });

    test('should accept an empty update', () => {
        expect(validate(jsonBody(updateCustomModel('cust-1', {}).payload))).toBe(true);
    });
});

// =============================================================================
// CUSTOM WORDS
// =============================================================================

const ADD_WORDS_SCHEMA = {
    type: 'object',
    properties: {
        words: { type: 'array', items: WORD_SCHEMA, minItems: 1 },
    },
    required: ['words'],
    additionalProperties: false,
};

const ADD_WORD_SCHEMA = {
    type: 'object',
    properties: {
        translation: { type: 'string', minLength: 1 },
        part_of_speech: { type: 'string' },
    },
    required: ['translation'],
    additionalProperties: false, // the word itself travels in the path
};

describe('Custom words contract', () => {
    test('should wrap several words in a words array', () => {
        const validate = ajv.compile(ADD_WORDS_SCHEMA);
        const body = jsonBody(addCustomWords('cust-1', [{ word: 'IEEE', translation: 'I triple E' }]).payload);
        expect(validate(body)).toBe(true);
    });

    test('should send only the translation for a single word', () => {
        const validate = ajv.compile(ADD_WORD_SCHEMA);
        const body = jsonBody(addCustomWord('cust-1', { word: 'IEEE', translation: 'I triple E' }).payload);
        expect(validate(body)).toBe(true);
        expect(body).toEqual({ translation: 'I triple E' });
    });

    test('should REJECT a single-word body that repeats the word', () => {
        const validate = ajv.compile(ADD_WORD_SCHEMA);
        expect(validate({ word: 'IEEE', translation: 'I triple E' })).toBe(false);
    });
});
