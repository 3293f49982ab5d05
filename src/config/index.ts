import dotenv from 'dotenv';
import { DEFAULT_VOICE, parseWatsonVoice, WatsonVoice } from '../domain/services/WatsonVoices';
import { isHttpsUrl } from '../infrastructure/watson/WatsonHttpClient';

// Load environment variables
dotenv.config();

/**
 * Client configuration loaded from environment variables.
 */
export interface Config {
    // IAM
    apiKey: string;
    iamUrl: string;
    tokenRefreshWindowSeconds: number;
    autoRefreshToken: boolean;

    // Service instances
    textToSpeechUrl: string;
    speechToTextUrl: string;

    // Text to Speech
    defaultVoice: WatsonVoice;

    // Transport
    requestTimeoutMs: number; // 0 disables the timeout
    debug: boolean;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    // Plain decimals only: no units, hex or Infinity
    if (!/^-?\d+(\.\d+)?$/.test(value)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return Number(value);
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = getEnvVar(key, defaultValue?.toString());
    return value.toLowerCase() === 'true';
}

function getEnvVarVoice(key: string, defaultValue: WatsonVoice): WatsonVoice {
    const value = getEnvVar(key, defaultValue);
    const voice = parseWatsonVoice(value);
    if (!voice) {
        throw new Error(`Environment variable ${key} must name a Watson voice, got: ${value}`);
    }
    return voice;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // IAM
        apiKey: getEnvVar('WATSON_API_KEY', ''),
        iamUrl: getEnvVar('WATSON_IAM_URL', 'https://iam.cloud.ibm.com/identity/token'),
        tokenRefreshWindowSeconds: getEnvVarNumber('WATSON_TOKEN_REFRESH_WINDOW_SECONDS', 60),
        autoRefreshToken: getEnvVarBoolean('WATSON_AUTO_REFRESH_TOKEN', true),

        // Service instances
        textToSpeechUrl: getEnvVar('WATSON_TTS_URL', ''),
        speechToTextUrl: getEnvVar('WATSON_STT_URL', ''),

        // Text to Speech
        defaultVoice: getEnvVarVoice('WATSON_TTS_VOICE', DEFAULT_VOICE),

        // Transport
        requestTimeoutMs: getEnvVarNumber('WATSON_REQUEST_TIMEOUT_MS', 0),
        debug: getEnvVarBoolean('WATSON_DEBUG', false),
    };
}

/**
 * Validates that the values needed to reach the services are present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.apiKey) {
        errors.push('WATSON_API_KEY is required to obtain an access token');
    }
    if (!isHttpsUrl(config.iamUrl)) {
        errors.push('WATSON_IAM_URL must be an https URL');
    }
    if (!config.textToSpeechUrl && !config.speechToTextUrl) {
        errors.push('At least one of WATSON_TTS_URL or WATSON_STT_URL is required');
    }
    if (config.textToSpeechUrl && !isHttpsUrl(config.textToSpeechUrl)) {
        errors.push('WATSON_TTS_URL must be an https URL');
    }
    if (config.speechToTextUrl && !isHttpsUrl(config.speechToTextUrl)) {
        errors.push('WATSON_STT_URL must be an https URL');
    }
    if (config.requestTimeoutMs < 0) {
        errors.push('WATSON_REQUEST_TIMEOUT_MS must not be negative');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
