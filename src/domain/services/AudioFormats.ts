/**
 * AudioFormats Service
 *
 * Maps the audio formats the synthesis endpoint can return to the `accept`
 * MIME strings the service matches literally.
 */

export type AudioEndianness = 'big-endian' | 'little-endian';

export const DEFAULT_SAMPLE_RATE = 22050;
export const OPUS_SAMPLE_RATE = 48000;
export const DEFAULT_ENDIANNESS: AudioEndianness = 'little-endian';

/**
 * Formats where the service requires a rate carry `sampleRate: number`;
 * where it has a default, the rate is optional.
 */
export type AudioFormat =
    | { type: 'alaw'; sampleRate: number }
    | { type: 'basic' }
    | { type: 'flac'; sampleRate?: number }
    | { type: 'l16'; sampleRate: number; endianness?: AudioEndianness }
    | { type: 'ogg'; sampleRate?: number }
    | { type: 'ogg-opus'; sampleRate?: number }
    | { type: 'ogg-vorbis'; sampleRate?: number }
    | { type: 'mp3'; sampleRate?: number }
    | { type: 'mpeg'; sampleRate?: number }
    | { type: 'mulaw'; sampleRate: number }
    | { type: 'wav'; sampleRate?: number }
    | { type: 'webm' }
    | { type: 'webm-opus' }
    | { type: 'webm-vorbis'; sampleRate?: number };

export type AudioFormatType = AudioFormat['type'];

export const DEFAULT_AUDIO_FORMAT: AudioFormat = { type: 'ogg-opus' };

/**
 * Returns the MIME string for a format, e.g. `audio/mp3;rate=22050`.
 */
export function formatAudioMimeType(format: AudioFormat): string {
    switch (format.type) {
        case 'alaw':
            return `audio/alaw;rate=${format.sampleRate}`;
        case 'basic':
            return 'audio/basic';
        case 'flac':
            return `audio/flac;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        case 'l16':
            return `audio/l16;rate=${format.sampleRate};endianness=${format.endianness ?? DEFAULT_ENDIANNESS}`;
        case 'ogg':
            return `audio/ogg;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        case 'ogg-opus':
            return `audio/ogg;codecs=opus;rate=${format.sampleRate ?? OPUS_SAMPLE_RATE}`;
        case 'ogg-vorbis':
            return `audio/ogg;codecs=vorbis;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        case 'mp3':
            return `audio/mp3;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        case 'mpeg':
            return `audio/mpeg;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        case 'mulaw':
            return `audio/mulaw;rate=${format.sampleRate}`;
        case 'wav':
            return `audio/wav;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        case 'webm':
            return 'audio/webm';
        case 'webm-opus':
            return 'audio/webm;codecs=opus';
        case 'webm-vorbis':
            return `audio/webm;codecs=vorbis;rate=${format.sampleRate ?? DEFAULT_SAMPLE_RATE}`;
        default: {
            const unknownFormat: never = format;
            throw new Error(`Unknown audio format: ${JSON.stringify(unknownFormat)}`);
        }
    }
}
