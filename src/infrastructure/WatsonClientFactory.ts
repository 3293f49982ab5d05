import { Config } from '../config';
import { IamAuthenticator } from './auth/IamAuthenticator';
import { WatsonSpeechToTextClient } from './stt/WatsonSpeechToTextClient';
import { WatsonTextToSpeechClient } from './tts/WatsonTextToSpeechClient';

export interface WatsonClients {
    authenticator: IamAuthenticator;
    /** Present when a Text to Speech URL is configured */
    textToSpeech?: WatsonTextToSpeechClient;
    /** Present when a Speech to Text URL is configured */
    speechToText?: WatsonSpeechToTextClient;
}

/**
 * Authenticates once and wires every configured service client to the
 * shared authenticator.
 */
export async function createWatsonClients(config: Config): Promise<WatsonClients> {
    const authenticator = await IamAuthenticator.create(config.apiKey, {
        iamUrl: config.iamUrl,
        autoRefresh: config.autoRefreshToken,
        refreshWindowSeconds: config.tokenRefreshWindowSeconds,
        timeoutMs: config.requestTimeoutMs,
        debug: config.debug,
    });

    const clients: WatsonClients = { authenticator };

    if (config.textToSpeechUrl) {
        clients.textToSpeech = new WatsonTextToSpeechClient({
            serviceUrl: config.textToSpeechUrl,
            token: authenticator,
            voice: config.defaultVoice,
            timeoutMs: config.requestTimeoutMs,
            debug: config.debug,
        });
    }

    if (config.speechToTextUrl) {
        clients.speechToText = new WatsonSpeechToTextClient({
            serviceUrl: config.speechToTextUrl,
            token: authenticator,
            timeoutMs: config.requestTimeoutMs,
            debug: config.debug,
        });
    }

    return clients;
}
