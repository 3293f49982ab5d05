import {
    AudioFormat,
    DEFAULT_AUDIO_FORMAT,
    formatAudioMimeType,
} from '../../../src/domain/services/AudioFormats';

describe('AudioFormats', () => {
    describe('formatAudioMimeType() defaults', () => {
        it.each<[AudioFormat, string]>([
            [{ type: 'basic' }, 'audio/basic'],
            [{ type: 'flac' }, 'audio/flac;rate=22050'],
            [{ type: 'ogg' }, 'audio/ogg;rate=22050'],
            [{ type: 'ogg-opus' }, 'audio/ogg;codecs=opus;rate=48000'],
            [{ type: 'ogg-vorbis' }, 'audio/ogg;codecs=vorbis;rate=22050'],
            [{ type: 'mp3' }, 'audio/mp3;rate=22050'],
            [{ type: 'mpeg' }, 'audio/mpeg;rate=22050'],
            [{ type: 'wav' }, 'audio/wav;rate=22050'],
            [{ type: 'webm' }, 'audio/webm'],
            [{ type: 'webm-opus' }, 'audio/webm;codecs=opus'],
            [{ type: 'webm-vorbis' }, 'audio/webm;codecs=vorbis;rate=22050'],
        ])('should format %j as %s', (format, expected) => {
            expect(formatAudioMimeType(format)).toBe(expected);
        });
    });

    describe('formatAudioMimeType() with explicit rates', () => {
        it('should use the given rate for formats that require one', () => {
            expect(formatAudioMimeType({ type: 'alaw', sampleRate: 8000 })).toBe('audio/alaw;rate=8000');
            expect(formatAudioMimeType({ type: 'mulaw', sampleRate: 8000 })).toBe('audio/mulaw;rate=8000');
        });

        it('should format l16 with little-endian unless told otherwise', () => {
            expect(formatAudioMimeType({ type: 'l16', sampleRate: 16000 })).toBe(
                'audio/l16;rate=16000;endianness=little-endian'
            );
            expect(formatAudioMimeType({ type: 'l16', sampleRate: 16000, endianness: 'big-endian' })).toBe(
                'audio/l16;rate=16000;endianness=big-endian'
            );
        });

        it('should override the default rate where one exists', () => {
            expect(formatAudioMimeType({ type: 'mp3', sampleRate: 44100 })).toBe('audio/mp3;rate=44100');
            expect(formatAudioMimeType({ type: 'ogg-opus', sampleRate: 24000 })).toBe('audio/ogg;codecs=opus;rate=24000');
        });
    });

    it('should default to ogg with the opus codec', () => {
        expect(formatAudioMimeType(DEFAULT_AUDIO_FORMAT)).toBe('audio/ogg;codecs=opus;rate=48000');
    });
});
