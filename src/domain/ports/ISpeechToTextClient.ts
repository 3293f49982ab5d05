import { SpeechModel } from '../entities/SpeechModel';
import { SpeechModelId } from '../services/SpeechModels';
import { RequestOptions } from './ITokenProvider';

/**
 * ISpeechToTextClient - Port for the Watson Speech to Text service.
 * Implementations: WatsonSpeechToTextClient
 */
export interface ISpeechToTextClient {
    listModels(options?: RequestOptions): Promise<SpeechModel[]>;
    getModel(model: SpeechModelId, options?: RequestOptions): Promise<SpeechModel>;
}
