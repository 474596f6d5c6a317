import Anthropic from '@anthropic-ai/sdk';
import { BaseOracle, OracleOptions, OracleReply } from './base-oracle';

export class AnthropicOracle extends BaseOracle {
    constructor(model: string, private readonly client: Anthropic, options: OracleOptions = {}) {
        super(model, options);
    }

    protected async request(directive: string, content: string): Promise<OracleReply> {
        const response = await this.client.messages.create({
            model: this.model,
            max_tokens: this.maxTokens,
            system: [{
                type: 'text',
                text: directive,
                cache_control: { type: 'ephemeral' } // Directive never changes for a speaker
            }],
            messages: [{
                role: 'user',
                content
            }]
        });

        for (const block of response.content) {
            if (block.type === 'text') {
                return {
                    text: block.text,
                    inputTokens: response.usage.input_tokens,
                    outputTokens: response.usage.output_tokens
                };
            }
        }
        throw new Error('No text content in response');
    }
}
