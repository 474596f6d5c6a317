import fs from 'fs/promises';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';

export type LogEntry = Record<string, unknown>;

export type CostSummaryRecord = {
    timestamp: string;
    runId: string;
    speaker: string;
    model: string;
    calls: number;
    inputTokens: number;
    outputTokens: number;
    cost: string;
};

export class FileUtils {
    static async ensureDirectoryExists(dirPath: string): Promise<void> {
        try {
            await fs.access(dirPath);
        } catch {
            await fs.mkdir(dirPath, { recursive: true });
        }
    }

    static async appendToLog(logPath: string, entry: LogEntry): Promise<void> {
        await this.ensureDirectoryExists(path.dirname(logPath));
        const logLine = `${JSON.stringify(entry)}\n`;
        await fs.appendFile(logPath, logLine, 'utf-8');
    }

    static async appendToCsv(csvPath: string, records: CostSummaryRecord[]): Promise<void> {
        await this.ensureDirectoryExists(path.dirname(csvPath));
        const exists = await fs.access(csvPath).then(() => true, () => false);

        const csvWriter = createObjectCsvWriter({
            path: csvPath,
            header: [
                { id: 'timestamp', title: 'Timestamp' },
                { id: 'runId', title: 'Run' },
                { id: 'speaker', title: 'Speaker' },
                { id: 'model', title: 'Model' },
                { id: 'calls', title: 'Calls' },
                { id: 'inputTokens', title: 'Input_Tokens' },
                { id: 'outputTokens', title: 'Output_Tokens' },
                { id: 'cost', title: 'Cost_USD' }
            ],
            append: exists  // Header only goes into a fresh file
        });

        await csvWriter.writeRecords(records);
    }

    static async readLogFile(logPath: string): Promise<LogEntry[]> {
        try {
            const content = await fs.readFile(logPath, 'utf-8');
            return content
                .split('\n')
                .filter(line => line.trim())
                .map((line): LogEntry => JSON.parse(line));
        } catch (error) {
            console.error(`Error reading log file ${logPath}:`, error);
            return [];
        }
    }

    static async readFile(filePath: string): Promise<string> {
        return await fs.readFile(filePath, 'utf-8');
    }
}
