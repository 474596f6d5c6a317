import OpenAI from 'openai';
import { OpenAIOracle } from '../openai-oracle';
import { OracleUnavailable } from '../../errors';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
    __esModule: true,
    default: class {
        chat = { completions: { create: mockCreate } };
    }
}));

const CONTENT = 'Here is the conversation so far.\nN: Begin the quest.\nH:';

describe('OpenAIOracle', () => {
    let oracle: OpenAIOracle;

    beforeEach(() => {
        mockCreate.mockReset();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        oracle = new OpenAIOracle('gpt-4o-mini', new OpenAI({ apiKey: 'test-key' }), {
            retry: { maxRetries: 0, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 1 }
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('sends system and user messages and returns the first choice', async () => {
        mockCreate.mockResolvedValue({
            choices: [{ message: { role: 'assistant', content: 'I go north.' } }],
            usage: { prompt_tokens: 40, completion_tokens: 6, total_tokens: 46 }
        });

        await expect(oracle.generate('You are the Hero.', CONTENT)).resolves.toBe('I go north.');

        expect(mockCreate).toHaveBeenCalledWith({
            model: 'gpt-4o-mini',
            max_completion_tokens: 1024,
            messages: [
                { role: 'system', content: 'You are the Hero.' },
                { role: 'user', content: CONTENT }
            ]
        });
        expect(oracle.getUsage()).toEqual({ calls: 1, input: 40, output: 6 });
    });

    test('a refusal with null content is an oracle failure', async () => {
        mockCreate.mockResolvedValue({
            choices: [{ message: { role: 'assistant', content: null, refusal: 'no' } }]
        });

        await expect(oracle.generate('You are the Hero.', CONTENT))
            .rejects.toThrow('Oracle "gpt-4o-mini" unavailable: No text content in response');
    });

    test('an empty choice list is an oracle failure', async () => {
        mockCreate.mockResolvedValue({ choices: [] });

        await expect(oracle.generate('You are the Hero.', CONTENT)).rejects.toBeInstanceOf(OracleUnavailable);
    });

    test('counts missing usage as zero tokens', async () => {
        mockCreate.mockResolvedValue({ choices: [{ message: { role: 'assistant', content: 'Onward.' } }] });

        await oracle.generate('You are the Hero.', CONTENT);

        expect(oracle.getUsage()).toEqual({ calls: 1, input: 0, output: 0 });
    });
});
