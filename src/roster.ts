import { Speaker } from './speaker';
import { createOracle, OracleFactoryOptions } from './oracles';
import { FileUtils } from './utils/file-utils';
import { SpeakerConfig } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: Record<string, unknown>, field: string, index: number): string {
    const value = entry[field];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new Error(`Roster entry ${index}: "${field}" must be a non-empty string`);
    }
    return value;
}

/**
 * Validate a decoded roster file: an array of
 * { identity, directive, model, role? } with unique identities.
 */
export function parseRoster(data: unknown): SpeakerConfig[] {
    if (!Array.isArray(data) || data.length === 0) {
        throw new Error('Roster must be a non-empty array of speakers');
    }

    const seen = new Set<string>();
    return data.map((entry: unknown, index) => {
        if (!isRecord(entry)) {
            throw new Error(`Roster entry ${index}: expected an object`);
        }

        const identity = requireString(entry, 'identity', index);
        if (seen.has(identity)) {
            throw new Error(`Roster entry ${index}: duplicate identity "${identity}"`);
        }
        seen.add(identity);

        const config: SpeakerConfig = {
            identity,
            directive: requireString(entry, 'directive', index),
            model: requireString(entry, 'model', index)
        };
        if (entry.role !== undefined) {
            config.role = requireString(entry, 'role', index);
        }
        return config;
    });
}

export async function loadRosterFile(filePath: string): Promise<SpeakerConfig[]> {
    const content = await FileUtils.readFile(filePath);
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error: unknown) {
        throw new Error(`Roster file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseRoster(data);
}

export interface BuildSpeakersOptions extends OracleFactoryOptions {
    logDirectory?: string;
}

/**
 * One speaker per config, each with its own oracle instance so usage is
 * tracked per speaker.
 */
export function buildSpeakers(configs: readonly SpeakerConfig[], options: BuildSpeakersOptions): Speaker[] {
    return configs.map(config => new Speaker(
        { identity: config.identity, directive: config.directive, role: config.role },
        createOracle(config.model, options),
        { logDirectory: options.logDirectory }
    ));
}
