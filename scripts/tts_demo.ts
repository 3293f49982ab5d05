import fs from 'fs';
import path from 'path';
import { getConfig, validateConfig } from '../src/config';
import { isWatsonError } from '../src/domain/errors/WatsonError';
import { createWatsonClients } from '../src/infrastructure/WatsonClientFactory';

/**
 * Lists the available voices, describes the configured one and writes a
 * short MP3 to ./output/hello.mp3.
 */
async function runTextToSpeechDemo() {
    const config = getConfig();
    const problems = validateConfig(config);
    if (problems.length > 0 || !config.textToSpeechUrl) {
        console.error('❌ Configuration is incomplete:');
        problems.forEach((problem) => console.error(`  - ${problem}`));
        if (!config.textToSpeechUrl) {
            console.error('  - WATSON_TTS_URL is not set');
        }
        process.exit(1);
    }

    const { textToSpeech } = await createWatsonClients(config);
    if (!textToSpeech) {
        process.exit(1);
    }

    try {
        const voices = await textToSpeech.listVoices();
        console.log(`🗣️  ${voices.length} voices available`);

        const voice = await textToSpeech.getVoice(textToSpeech.voice);
        console.log(`🎙️  Using ${voice.name} (${voice.language}, ${voice.gender})`);

        const audio = await textToSpeech.synthesize('Hello from Watson Text to Speech.', {
            format: { type: 'mp3' },
        });

        const outputDir = path.join(process.cwd(), 'output');
        fs.mkdirSync(outputDir, { recursive: true });
        const outputPath = path.join(outputDir, 'hello.mp3');
        fs.writeFileSync(outputPath, audio);
        console.log(`✅ Wrote ${audio.length} bytes to ${outputPath}`);
    } catch (error) {
        console.error('❌ FAILED!');
        if (isWatsonError(error)) {
            console.error(`${error.kind}: ${error.message}`);
        } else {
            console.error('Error:', error);
        }
        process.exit(1);
    }
}

runTextToSpeechDemo().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
