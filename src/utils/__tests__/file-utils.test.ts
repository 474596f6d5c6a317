import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CostSummaryRecord, FileUtils } from '../file-utils';

describe('FileUtils', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-utils-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('appends JSON lines and reads them back, creating directories', async () => {
        const logPath = path.join(dir, 'nested', 'deeper', 'run.log');

        await FileUtils.appendToLog(logPath, { message: 'first', turnIndex: 0 });
        await FileUtils.appendToLog(logPath, { message: 'second', turnIndex: 1 });

        await expect(FileUtils.readFile(logPath)).resolves.toBe(
            '{"message":"first","turnIndex":0}\n{"message":"second","turnIndex":1}\n'
        );
        await expect(FileUtils.readLogFile(logPath)).resolves.toEqual([
            { message: 'first', turnIndex: 0 },
            { message: 'second', turnIndex: 1 }
        ]);
    });

    test('reading a missing log yields no entries', async () => {
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => { });

        await expect(FileUtils.readLogFile(path.join(dir, 'missing.log'))).resolves.toEqual([]);
        expect(errorSpy).toHaveBeenCalledTimes(1);

        errorSpy.mockRestore();
    });

    test('writes the CSV header only once', async () => {
        const csvPath = path.join(dir, 'summaries', 'costs.csv');
        const record: CostSummaryRecord = {
            timestamp: '2026-01-01T00:00:00.000Z',
            runId: 'run-1',
            speaker: 'Hero',
            model: 'human',
            calls: 2,
            inputTokens: 0,
            outputTokens: 0,
            cost: '0.000000'
        };

        await FileUtils.appendToCsv(csvPath, [record]);
        await FileUtils.appendToCsv(csvPath, [{ ...record, runId: 'run-2' }]);

        const lines = (await FileUtils.readFile(csvPath)).split('\n');
        expect(lines).toEqual([
            'Timestamp,Run,Speaker,Model,Calls,Input_Tokens,Output_Tokens,Cost_USD',
            '2026-01-01T00:00:00.000Z,run-1,Hero,human,2,0,0,0.000000',
            '2026-01-01T00:00:00.000Z,run-2,Hero,human,2,0,0,0.000000',
            ''
        ]);
    });
});
