import modelTable from './catalog/speechModels.json';

/**
 * Symbolic name of a speech-to-text model, e.g. `FrFrNarrowbandModel`.
 */
export type SpeechModelId = keyof typeof modelTable;

export const DEFAULT_SPEECH_MODEL: SpeechModelId = 'EnUsBroadbandModel';

export function speechModelId(model: SpeechModelId): string {
    return modelTable[model];
}

export function isSpeechModelId(value: string): value is SpeechModelId {
    return Object.prototype.hasOwnProperty.call(modelTable, value);
}

export function listSpeechModelIds(): SpeechModelId[] {
    return Object.keys(modelTable).filter(isSpeechModelId);
}

export function findSpeechModelById(id: string): SpeechModelId | undefined {
    return listSpeechModelIds().find((model) => modelTable[model] === id);
}
