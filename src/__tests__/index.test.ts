import { formatTurn, parseArgs } from '../index';

describe('CLI arguments', () => {
    test('parses every flag in short and long form', () => {
        expect(parseArgs(['-t', '4', '-r', 'roster.json', '-o', 'Begin.', '-i', 'Narrator', '--stop', '<END>'])).toEqual({
            maxTurns: 4,
            rosterPath: 'roster.json',
            opening: 'Begin.',
            initiator: 'Narrator',
            stopMarker: '<END>'
        });
        expect(parseArgs(['--turns', '2', '--roster', 'r.json', '--opening', 'Go.', '--initiator', 'Host'])).toEqual({
            maxTurns: 2,
            rosterPath: 'r.json',
            opening: 'Go.',
            initiator: 'Host'
        });
    });

    test('no arguments means all defaults', () => {
        expect(parseArgs([])).toEqual({});
    });

    test('rejects bad input', () => {
        expect(() => parseArgs(['--turns', '0'])).toThrow('Invalid turn count. Must be a positive integer.');
        expect(() => parseArgs(['--turns'])).toThrow('Missing value for --turns');
        expect(() => parseArgs(['--verbose', 'yes'])).toThrow('Unknown argument: --verbose');
    });

    test('formats a turn for display', () => {
        expect(formatTurn({ identity: 'Hero', text: 'I go north.', turnIndex: 0 })).toBe('[0] Hero: I go north.');
    });
});
