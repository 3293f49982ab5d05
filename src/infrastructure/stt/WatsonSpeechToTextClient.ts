import { SpeechModel } from '../../domain/entities/SpeechModel';
import { ISpeechToTextClient } from '../../domain/ports/ISpeechToTextClient';
import { RequestOptions } from '../../domain/ports/ITokenProvider';
import { SpeechModelId } from '../../domain/services/SpeechModels';
import * as operations from '../watson/operations/speechToText';
import { TokenSource, WatsonHttpClient } from '../watson/WatsonHttpClient';

export interface WatsonSpeechToTextClientOptions {
    serviceUrl: string;
    token: TokenSource;
    timeoutMs?: number;
    debug?: boolean;
}

/**
 * Watson Speech to Text client (model catalog).
 */
export class WatsonSpeechToTextClient implements ISpeechToTextClient {
    private readonly http: WatsonHttpClient;

    constructor(options: WatsonSpeechToTextClientOptions) {
        this.http = new WatsonHttpClient({ ...options, label: 'Watson STT' });
    }

    async listModels(options?: RequestOptions): Promise<SpeechModel[]> {
        return this.http.execute(operations.listModels(), options);
    }

    async getModel(model: SpeechModelId, options?: RequestOptions): Promise<SpeechModel> {
        return this.http.execute(operations.getModel(model), options);
    }
}
