import * as dotenv from 'dotenv';
import { DEFAULT_SPEECH_MODEL } from '../src/domain/services/SpeechModels';
import { IamAuthenticator } from '../src/infrastructure/auth/IamAuthenticator';
import { WatsonSpeechToTextClient } from '../src/infrastructure/stt/WatsonSpeechToTextClient';

dotenv.config();

async function listSpeechModels() {
    const apiKey = process.env.WATSON_API_KEY;
    const serviceUrl = process.env.WATSON_STT_URL;

    if (!apiKey || !serviceUrl) {
        console.error('❌ WATSON_API_KEY and WATSON_STT_URL must be set in .env');
        process.exit(1);
    }

    const authenticator = await IamAuthenticator.create(apiKey);
    const client = new WatsonSpeechToTextClient({ serviceUrl, token: authenticator });

    const models = await client.listModels();
    console.log(`📚 ${models.length} models:`);
    for (const model of models) {
        console.log(`  - ${model.name} (${model.rate} Hz)`);
    }

    const model = await client.getModel(DEFAULT_SPEECH_MODEL);
    console.log(`🔎 ${model.name}: ${model.description}`);
}

listSpeechModels().catch((error) => {
    console.error('❌ FAILED!', error);
    process.exit(1);
});
