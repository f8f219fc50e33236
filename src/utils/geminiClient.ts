import { GoogleGenAI, type GenerateContentResponse } from '@google/genai';
import { DEFAULT_TEMPERATURE } from '@shared/constants';
import { GenerationError } from '@shared/errors';
import { getErrorStatus } from '@shared/utils/typeGuards';

export interface TextPrompt {
    system: string;
    user: string;
}

/**
 * The text-generation seam. Production uses Gemini; tests pass a fake.
 */
export interface TextGenerator {
    generate(prompt: TextPrompt, signal?: AbortSignal): Promise<string>;
}

export class GeminiTextGenerator implements TextGenerator {
    private readonly ai: GoogleGenAI;

    constructor(apiKey: string, private readonly model: string, private readonly temperature = DEFAULT_TEMPERATURE) {
        this.ai = new GoogleGenAI({ apiKey });
    }

    async generate(prompt: TextPrompt, signal?: AbortSignal): Promise<string> {
        let result: GenerateContentResponse;
        try {
            result = await this.ai.models.generateContent({
                model: this.model,
                contents: [{ role: 'user', parts: [{ text: prompt.user }] }],
                config: {
                    temperature: this.temperature,
                    responseMimeType: 'application/json',
                    systemInstruction: { parts: [{ text: prompt.system }] },
                    ...(signal ? { abortSignal: signal } : {}),
                },
            });
        } catch (error: unknown) {
            const status = getErrorStatus(error);
            if (status === 401 || status === 403) {
                throw new GenerationError('Text generation rejected the API key', 'AUTH', false, error);
            }
            throw error;
        }

        const text = result.candidates?.[0]?.content?.parts?.[0]?.text;
        if (!text) {
            throw new GenerationError('Empty response from AI model', 'EMPTY_RESPONSE', true);
        }
        return text;
    }
}
