import { Speaker } from '../speaker';
import { estimateCost } from '../oracles/pricing';
import { CostSummaryRecord } from './file-utils';

export function buildCostRecords(
    speakers: readonly Speaker[],
    runId: string,
    timestamp: Date = new Date()
): CostSummaryRecord[] {
    return speakers.map(speaker => {
        const usage = speaker.getUsage() ?? { calls: 0, input: 0, output: 0 };
        return {
            timestamp: timestamp.toISOString(),
            runId,
            speaker: speaker.identity,
            model: speaker.getModel(),
            calls: usage.calls,
            inputTokens: usage.input,
            outputTokens: usage.output,
            cost: estimateCost(speaker.getModel(), usage).toFixed(6)
        };
    });
}

export function totalCost(records: readonly CostSummaryRecord[]): number {
    return records.reduce((sum, record) => sum + Number(record.cost), 0);
}
