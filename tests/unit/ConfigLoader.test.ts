import { loadConfig, resetConfig, getConfig, validateConfig } from '../../src/config/index';

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        jest.resetModules();
        process.env = { ...originalEnv };
        for (const key of Object.keys(process.env)) {
            if (key.startsWith('WATSON_')) {
                delete process.env[key];
            }
        }
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should apply defaults when nothing is set', () => {
        const config = loadConfig();

        expect(config).toEqual({
            apiKey: '',
            iamUrl: 'https://iam.cloud.ibm.com/identity/token',
            tokenRefreshWindowSeconds: 60,
            autoRefreshToken: true,
            textToSpeechUrl: '',
            speechToTextUrl: '',
            defaultVoice: 'EnUsMichaelV3',
            requestTimeoutMs: 0,
            debug: false,
        });
    });

    it('should strip double quotes from environment variables', () => {
        process.env.WATSON_API_KEY = '"test-secret"';

        expect(loadConfig().apiKey).toBe('test-secret');
    });

    it('should strip single quotes from environment variables', () => {
        process.env.WATSON_API_KEY = "'test-secret'";

        expect(loadConfig().apiKey).toBe('test-secret');
    });

    it('should trim whitespace from environment variables', () => {
        process.env.WATSON_TTS_URL = '  https://api.tts.example.com/instances/abc  ';

        expect(loadConfig().textToSpeechUrl).toBe('https://api.tts.example.com/instances/abc');
    });

    it('should handle numeric variables with quotes', () => {
        process.env.WATSON_REQUEST_TIMEOUT_MS = '"15000"';

        expect(loadConfig().requestTimeoutMs).toBe(15000);
    });

    it('should throw on a non-numeric number', () => {
        process.env.WATSON_TOKEN_REFRESH_WINDOW_SECONDS = 'soon';

        expect(() => loadConfig()).toThrow('Environment variable WATSON_TOKEN_REFRESH_WINDOW_SECONDS must be a number, got: soon');
    });

    it.each(['60s', 'Infinity', '0x10', '1e3', ''])('should reject %j as a number', (value) => {
        process.env.WATSON_REQUEST_TIMEOUT_MS = value;

        expect(() => loadConfig()).toThrow(`Environment variable WATSON_REQUEST_TIMEOUT_MS must be a number, got: ${value}`);
    });

    it('should strip quotes from booleans', () => {
        process.env.WATSON_DEBUG = '"true"';
        process.env.WATSON_AUTO_REFRESH_TOKEN = " 'false' ";

        const config = loadConfig();

        expect(config.debug).toBe(true);
        expect(config.autoRefreshToken).toBe(false);
    });

    it('should read booleans case-insensitively', () => {
        process.env.WATSON_DEBUG = 'TRUE';
        process.env.WATSON_AUTO_REFRESH_TOKEN = 'false';

        const config = loadConfig();

        expect(config.debug).toBe(true);
        expect(config.autoRefreshToken).toBe(false);
    });

    it('should accept the voice as a symbol or a service ID', () => {
        process.env.WATSON_TTS_VOICE = 'EnGbKateV3';
        expect(loadConfig().defaultVoice).toBe('EnGbKateV3');

        process.env.WATSON_TTS_VOICE = 'fr-FR_ReneeV3Voice';
        expect(loadConfig().defaultVoice).toBe('FrFrReneeV3');
    });

    it('should throw on an unknown voice', () => {
        process.env.WATSON_TTS_VOICE = 'Robot';

        expect(() => loadConfig()).toThrow('Environment variable WATSON_TTS_VOICE must name a Watson voice, got: Robot');
    });

    it('should cache the config until reset', () => {
        process.env.WATSON_API_KEY = 'first-key';
        const first = getConfig();

        process.env.WATSON_API_KEY = 'second-key';
        expect(getConfig()).toBe(first);

        resetConfig();
        expect(getConfig().apiKey).toBe('second-key');
    });

    describe('validateConfig()', () => {
        it('should report a missing key and missing service URLs', () => {
            expect(validateConfig(loadConfig())).toEqual([
                'WATSON_API_KEY is required to obtain an access token',
                'At least one of WATSON_TTS_URL or WATSON_STT_URL is required',
            ]);
        });

        it('should report URLs that are not https', () => {
            process.env.WATSON_API_KEY = 'test-secret';
            process.env.WATSON_TTS_URL = 'http://api.tts.example.com';
            process.env.WATSON_IAM_URL = 'http://iam.example.com/identity/token';

            expect(validateConfig(loadConfig())).toEqual([
                'WATSON_IAM_URL must be an https URL',
                'WATSON_TTS_URL must be an https URL',
            ]);
        });

        it('should accept a complete configuration', () => {
            process.env.WATSON_API_KEY = 'test-secret';
            process.env.WATSON_STT_URL = 'https://api.stt.example.com/instances/abc';

            expect(validateConfig(loadConfig())).toEqual([]);
        });
    });
});
