import OpenAI from 'openai';
import { BaseOracle, OracleOptions, OracleReply } from './base-oracle';

export class OpenAIOracle extends BaseOracle {
    constructor(model: string, private readonly client: OpenAI, options: OracleOptions = {}) {
        super(model, options);
    }

    protected async request(directive: string, content: string): Promise<OracleReply> {
        const completion = await this.client.chat.completions.create({
            model: this.model,
            max_completion_tokens: this.maxTokens,
            messages: [
                { role: 'system', content: directive },
                { role: 'user', content }
            ]
        });

        const text = completion.choices[0]?.message?.content;
        if (typeof text !== 'string') {
            throw new Error('No text content in response');
        }

        return {
            text,
            inputTokens: completion.usage?.prompt_tokens ?? 0,
            outputTokens: completion.usage?.completion_tokens ?? 0
        };
    }
}
