import type { AppConfig } from '../../config';
import { OpenAITTSService } from './OpenAITTSService';
import type { ITTSService } from './types';

export function createTTSService(config: AppConfig): ITTSService {
    return new OpenAITTSService({
        apiKey: config.ai.openaiApiKey,
        model: config.ai.ttsModel,
        baseURL: config.ai.openaiBaseUrl,
    });
}

export type { ITTSService } from './types';
export { TTS_SAMPLE_RATE } from './types';
