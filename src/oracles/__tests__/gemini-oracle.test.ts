import { GoogleGenerativeAI } from '@google/generative-ai';
import { GeminiOracle } from '../gemini-oracle';

const mockGenerateContent = jest.fn();
const mockGetGenerativeModel = jest.fn();

jest.mock('@google/generative-ai', () => ({
    GoogleGenerativeAI: class {
        getGenerativeModel = mockGetGenerativeModel;
    }
}));

const NO_RETRY = { maxRetries: 0, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 1 };

describe('GeminiOracle', () => {
    let oracle: GeminiOracle;

    beforeEach(() => {
        mockGenerateContent.mockReset();
        mockGetGenerativeModel.mockReset();
        mockGetGenerativeModel.mockImplementation(() => ({ generateContent: mockGenerateContent }));
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        oracle = new GeminiOracle('gemini-2.0-flash', new GoogleGenerativeAI('test-key'), { retry: NO_RETRY, maxTokens: 128 });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('passes the directive as system instruction', async () => {
        mockGenerateContent.mockResolvedValue({
            response: {
                text: () => 'I go north.',
                usageMetadata: { promptTokenCount: 20, candidatesTokenCount: 5, totalTokenCount: 25 }
            }
        });

        await expect(oracle.generate('You are the Hero.', 'Hello')).resolves.toBe('I go north.');

        expect(mockGetGenerativeModel).toHaveBeenCalledWith({
            model: 'gemini-2.0-flash',
            systemInstruction: 'You are the Hero.',
            generationConfig: { maxOutputTokens: 128 }
        });
        expect(mockGenerateContent).toHaveBeenCalledWith('Hello');
        expect(oracle.getUsage()).toEqual({ calls: 1, input: 20, output: 5 });
    });

    test('estimates usage when metadata is missing', async () => {
        mockGenerateContent.mockResolvedValue({ response: { text: () => 'I go north.' } });

        await oracle.generate('Be brave.', 'Hello');

        // ceil((9 + 5) / 4) and ceil(11 / 4)
        expect(oracle.getUsage()).toEqual({ calls: 1, input: 4, output: 3 });
        expect(console.warn).toHaveBeenCalledWith('⚠️ No usage metadata in Gemini response (using estimates)');
    });

    test('names the model when it does not exist', async () => {
        mockGenerateContent.mockRejectedValue(new Error('[404 Not Found] models/gemini-0 is not found'));

        await expect(oracle.generate('Be brave.', 'Hello'))
            .rejects.toThrow('Oracle "gemini-2.0-flash" unavailable: Invalid Gemini model "gemini-2.0-flash"');
    });

    test('a blocked response is an oracle failure', async () => {
        mockGenerateContent.mockResolvedValue({
            response: {
                text: () => { throw new Error('Text not available. Response was blocked due to SAFETY'); }
            }
        });

        await expect(oracle.generate('Be brave.', 'Hello'))
            .rejects.toThrow('Oracle "gemini-2.0-flash" unavailable: Text not available. Response was blocked due to SAFETY');
    });
});
