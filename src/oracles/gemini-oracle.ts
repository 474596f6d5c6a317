import { GoogleGenerativeAI } from '@google/generative-ai';
import { BaseOracle, OracleOptions, OracleReply } from './base-oracle';
import { sleep } from '../utils/error-recovery';

export interface GeminiOracleOptions extends OracleOptions {
    throttleMs?: number;
}

export class GeminiOracle extends BaseOracle {
    private readonly throttleMs: number;

    constructor(model: string, private readonly client: GoogleGenerativeAI, options: GeminiOracleOptions = {}) {
        super(model, options);
        this.throttleMs = options.throttleMs ?? 0;
    }

    protected async request(directive: string, content: string): Promise<OracleReply> {
        const model = this.client.getGenerativeModel({
            model: this.model,
            systemInstruction: directive,
            generationConfig: { maxOutputTokens: this.maxTokens }
        });

        try {
            const result = await model.generateContent(content);
            const response = result.response;
            const text = response.text();

            if (!response.usageMetadata) {
                console.warn('⚠️ No usage metadata in Gemini response (using estimates)');
            }

            const reply: OracleReply = {
                text,
                inputTokens: response.usageMetadata?.promptTokenCount ?? Math.ceil((directive.length + content.length) / 4),
                outputTokens: response.usageMetadata?.candidatesTokenCount ?? Math.ceil(text.length / 4)
            };

            // Throttling for Free Tier (15 RPM limit)
            if (this.throttleMs > 0) {
                console.log(`   ⏳ Throttling Gemini request for ${this.throttleMs}ms (Free Tier limit)...`);
                await sleep(this.throttleMs);
            }

            return reply;
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            if (message.includes('404') || message.includes('not found') || message.includes('not supported')) {
                throw new Error(`Invalid Gemini model "${this.model}". Original error: ${message}`);
            }
            throw error;
        }
    }
}
