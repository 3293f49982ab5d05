import voiceTable from './catalog/voices.json';

/**
 * Symbolic name of a Watson text-to-speech voice, e.g. `EnGbKateV3`.
 * The literal IDs the service expects live in catalog/voices.json.
 */
export type WatsonVoice = keyof typeof voiceTable;

export const DEFAULT_VOICE: WatsonVoice = 'EnUsMichaelV3';

/**
 * Returns the voice ID the service expects, e.g. `en-GB_KateV3Voice`.
 */
export function voiceId(voice: WatsonVoice): string {
    return voiceTable[voice];
}

export function isWatsonVoice(value: string): value is WatsonVoice {
    return Object.prototype.hasOwnProperty.call(voiceTable, value);
}

export function listWatsonVoices(): WatsonVoice[] {
    return Object.keys(voiceTable).filter(isWatsonVoice);
}

/**
 * Reverse lookup from a service voice ID to its symbol.
 */
export function findVoiceById(id: string): WatsonVoice | undefined {
    return listWatsonVoices().find((voice) => voiceTable[voice] === id);
}

/**
 * Accepts either a symbol (`EnUsLisaV3`) or a service ID (`en-US_LisaV3Voice`).
 */
export function parseWatsonVoice(value: string): WatsonVoice | undefined {
    return isWatsonVoice(value) ? value : findVoiceById(value);
}
