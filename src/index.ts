export { Config, getConfig, loadConfig, resetConfig, validateConfig } from './config';

export * from './domain/errors/WatsonError';

export { AccessToken, isTokenExpired, nowInSeconds } from './domain/entities/AccessToken';
export { CustomModel } from './domain/entities/CustomModel';
export { Prompt, PromptMetadata } from './domain/entities/Prompt';
export { Pronunciation } from './domain/entities/Pronunciation';
export { Speaker, SpeakerCustomModel, SpeakerPrompt } from './domain/entities/Speaker';
export { SpeechModel, SpeechModelFeatures } from './domain/entities/SpeechModel';
export { SupportedFeatures, Voice } from './domain/entities/Voice';
export { Translation, Word } from './domain/entities/Word';

export {
    AudioSource,
    CreateCustomModelInput,
    GetVoiceOptions,
    ITextToSpeechClient,
    PronunciationOptions,
    SynthesisOptions,
    UpdateCustomModelInput,
} from './domain/ports/ITextToSpeechClient';
export { ISpeechToTextClient } from './domain/ports/ISpeechToTextClient';
export { ITokenProvider, RequestOptions } from './domain/ports/ITokenProvider';

export * from './domain/services/AudioFormats';
export * from './domain/services/Languages';
export * from './domain/services/PhonemeFormats';
export * from './domain/services/SpeechModels';
export * from './domain/services/WatsonVoices';

export {
    DEFAULT_IAM_URL,
    DEFAULT_REFRESH_WINDOW_SECONDS,
    exchangeApiKey,
    IamAuthenticator,
    IamAuthenticatorOptions,
} from './infrastructure/auth/IamAuthenticator';
export { WatsonSpeechToTextClient, WatsonSpeechToTextClientOptions } from './infrastructure/stt/WatsonSpeechToTextClient';
export { WatsonTextToSpeechClient, WatsonTextToSpeechClientOptions } from './infrastructure/tts/WatsonTextToSpeechClient';
export { createWatsonClients, WatsonClients } from './infrastructure/WatsonClientFactory';
export { TokenSource } from './infrastructure/watson/WatsonHttpClient';
