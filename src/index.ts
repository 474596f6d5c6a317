#!/usr/bin/env node
import path from 'path';
import { Orchestrator } from './orchestrator';
import { runConversation, stopWhenContains } from './conversation';
import { buildSpeakers, loadRosterFile } from './roster';
import { DEFAULT_OPENING, loadSettings, SPEAKER_CONFIGS } from './config';
import { isOracleUnavailable } from './errors';
import { FileUtils } from './utils/file-utils';
import { buildCostRecords, totalCost } from './utils/cost-summary';
import { TurnResult } from './types';

export { Orchestrator } from './orchestrator';
export { Speaker, NARRATIVE_PREAMBLE } from './speaker';
export { OracleUnavailable, isOracleUnavailable } from './errors';
export { roundRobin, fixedOrder, seededRandom } from './selection';
export { runConversation, stopWhenContains } from './conversation';
export { parseRoster, loadRosterFile, buildSpeakers } from './roster';
export { createOracle, estimateCost } from './oracles';
export type * from './types';

export interface CliArgs {
    maxTurns?: number;
    rosterPath?: string;
    opening?: string;
    initiator?: string;
    stopMarker?: string;
}

export function parseArgs(args: string[]): CliArgs {
    const parsed: CliArgs = {};

    for (let i = 0; i < args.length; i++) {
        const flag = args[i];
        const value = args[i + 1];
        if (value === undefined) {
            throw new Error(`Missing value for ${flag}`);
        }

        if (flag === '-t' || flag === '--turns') {
            const turns = Number(value);
            if (!Number.isInteger(turns) || turns < 1) {
                throw new Error('Invalid turn count. Must be a positive integer.');
            }
            parsed.maxTurns = turns;
        } else if (flag === '-r' || flag === '--roster') {
            parsed.rosterPath = value;
        } else if (flag === '-o' || flag === '--opening') {
            parsed.opening = value;
        } else if (flag === '-i' || flag === '--initiator') {
            parsed.initiator = value;
        } else if (flag === '--stop') {
            parsed.stopMarker = value;
        } else {
            throw new Error(`Unknown argument: ${flag}`);
        }
        i++; // Skip the value we just used
    }

    return parsed;
}

export function formatTurn(turn: TurnResult): string {
    return `[${turn.turnIndex}] ${turn.identity}: ${turn.text}`;
}

async function main(): Promise<void> {
    let args: CliArgs;
    try {
        args = parseArgs(process.argv.slice(2));
    } catch (error: unknown) {
        console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
        return;
    }

    const settings = loadSettings();
    const configs = args.rosterPath ? await loadRosterFile(args.rosterPath) : SPEAKER_CONFIGS;
    const logDirectory = path.resolve(settings.logDirectory);
    const speakers = buildSpeakers(configs, {
        timeoutMs: settings.oracleTimeoutMs,
        maxTokens: settings.maxTokens,
        showPrompts: settings.showPrompts,
        logDirectory
    });
    const orchestrator = new Orchestrator(speakers, { logDirectory });

    console.log('\n👥 ROSTER');
    for (const speaker of speakers) {
        console.log(`   - ${speaker.identity}${speaker.role ? ` (${speaker.role})` : ''} on ${speaker.getModel()}`);
    }

    const initiator = args.initiator ?? speakers[0].identity;
    const opening = args.opening ?? DEFAULT_OPENING;
    orchestrator.prime(initiator, opening);
    console.log(`\n🎬 ${initiator}: ${opening}\n`);

    const runId = new Date().toISOString().replace(/[:.]/g, '-');
    try {
        const outcome = await runConversation(orchestrator, {
            maxTurns: args.maxTurns ?? settings.maxTurns,
            stopWhen: args.stopMarker ? stopWhenContains(args.stopMarker) : undefined,
            onTurn: turn => console.log(formatTurn(turn))
        });
        console.log(`\n✅ Conversation ended after ${outcome.turns.length} turns (${outcome.stoppedBy})`);
    } catch (error: unknown) {
        if (!isOracleUnavailable(error)) {
            throw error;
        }
        console.error(`\n❌ ${error.message}`);
        console.error(`   Conversation stopped at turn ${orchestrator.getTurnIndex()}; no partial turn was recorded.`);
        process.exitCode = 1;
    } finally {
        for (const speaker of speakers) {
            speaker.close();
        }
        const records = buildCostRecords(speakers, runId);
        console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
        console.log('💰 RUN COST SUMMARY');
        console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
        for (const record of records) {
            console.log(`${record.speaker.padEnd(16)} ${record.calls} calls  $${Number(record.cost).toFixed(4)}`);
        }
        console.log(`Total:           $${totalCost(records).toFixed(4)}`);
        console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');
        await FileUtils.appendToCsv(path.resolve(settings.costSummaryPath), records);
    }
}

if (require.main === module) {
    main().catch(error => {
        console.error('Error running conversation:', error);
        process.exitCode = 1;
    });
}
