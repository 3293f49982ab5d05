import { DEFAULT_LANGUAGE, LANGUAGE_CODES, languageCode } from '../../../src/domain/services/Languages';
import { DEFAULT_PHONEME_FORMAT } from '../../../src/domain/services/PhonemeFormats';
import {
    DEFAULT_SPEECH_MODEL,
    findSpeechModelById,
    isSpeechModelId,
    listSpeechModelIds,
    speechModelId,
} from '../../../src/domain/services/SpeechModels';
import {
    DEFAULT_VOICE,
    findVoiceById,
    isWatsonVoice,
    listWatsonVoices,
    parseWatsonVoice,
    voiceId,
} from '../../../src/domain/services/WatsonVoices';

describe('Identifier tables', () => {
    describe('WatsonVoices', () => {
        const voices = listWatsonVoices();

        it('should map every voice to a distinct, non-empty ID', () => {
            const ids = voices.map(voiceId);

            expect(voices).toHaveLength(40);
            expect(ids.every((id) => id.length > 0)).toBe(true);
            expect(new Set(ids).size).toBe(ids.length);
        });

        it('should round-trip every voice through its ID', () => {
            for (const voice of voices) {
                expect(findVoiceById(voiceId(voice))).toBe(voice);
            }
        });

        it('should default to Michael V3', () => {
            expect(DEFAULT_VOICE).toBe('EnUsMichaelV3');
            expect(voiceId(DEFAULT_VOICE)).toBe('en-US_MichaelV3Voice');
        });

        it('should parse either a symbol or a service ID', () => {
            expect(parseWatsonVoice('EnGbKateV3')).toBe('EnGbKateV3');
            expect(parseWatsonVoice('en-GB_KateV3Voice')).toBe('EnGbKateV3');
            expect(parseWatsonVoice('en-GB_Unknown')).toBeUndefined();
        });

        it('should not treat inherited object keys as voices', () => {
            expect(isWatsonVoice('toString')).toBe(false);
            expect(isWatsonVoice('constructor')).toBe(false);
        });
    });

    describe('SpeechModels', () => {
        const models = listSpeechModelIds();

        it('should map every model to a distinct, non-empty ID', () => {
            const ids = models.map(speechModelId);

            expect(ids.length).toBeGreaterThan(0);
            expect(ids.every((id) => id.length > 0)).toBe(true);
            expect(new Set(ids).size).toBe(ids.length);
        });

        it('should keep the German and French broadband and narrowband models apart', () => {
            expect(speechModelId('DeDeBroadbandModel')).toBe('de-DE_BroadbandModel');
            expect(speechModelId('DeDeNarrowbandModel')).toBe('de-DE_NarrowbandModel');
            expect(speechModelId('FrFrBroadbandModel')).toBe('fr-FR_BroadbandModel');
            expect(speechModelId('FrFrNarrowbandModel')).toBe('fr-FR_NarrowbandModel');
        });

        it('should find a model by its service ID', () => {
            expect(findSpeechModelById('en-US_BroadbandModel')).toBe(DEFAULT_SPEECH_MODEL);
            expect(findSpeechModelById('xx-XX_Model')).toBeUndefined();
            expect(isSpeechModelId('hasOwnProperty')).toBe(false);
        });
    });

    describe('Languages', () => {
        it('should map every language to a distinct code', () => {
            const codes = Object.values(LANGUAGE_CODES);

            expect(codes).toHaveLength(19);
            expect(new Set(codes).size).toBe(codes.length);
        });

        it('should default to en-US', () => {
            expect(DEFAULT_LANGUAGE).toBe('EnUs');
            expect(languageCode()).toBe('en-US');
            expect(languageCode('PtBr')).toBe('pt-BR');
        });
    });

    it('should default phonemes to IPA', () => {
        expect(DEFAULT_PHONEME_FORMAT).toBe('ipa');
    });
});
