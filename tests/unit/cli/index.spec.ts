import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCli } from 'cli/index';

const originalArgv = [...process.argv];

const setArgv = (...args: string[]) => {
    process.argv = ['node', 'bounce-choreographer', ...args];
};

let directory = '';
let configPath = '';

beforeAll(async () => {
    directory = await mkdtemp(join(tmpdir(), 'bounce-cli-'));
    configPath = join(directory, 'scene.json');
    await writeFile(
        configPath,
        JSON.stringify({
            arena: { width: 100, height: 100 },
            ball: { x: 0, y: 0, size: 10, speed: 5 },
            platform: { length: 20, thickness: 4 },
        }),
        'utf8',
    );
});

afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
});

beforeEach(() => {
    process.argv = [...originalArgv];
});

afterEach(() => {
    process.argv = [...originalArgv];
    vi.restoreAllMocks();
});

const captureConsole = () => ({
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
});

describe('createCli', () => {
    it('returns usage help for a missing command', async () => {
        const { error } = captureConsole();
        setArgv();

        const exitCode = await createCli().execute();

        expect(exitCode).toBe(1);
        expect(error).toHaveBeenCalledWith('Usage: bounce-choreographer <solve|sweep> [options]');
    });

    it('returns usage help for an unknown command', async () => {
        const { error } = captureConsole();
        setArgv('dance');

        expect(await createCli().execute()).toBe(1);
        expect(error).toHaveBeenCalledWith('Usage: bounce-choreographer <solve|sweep> [options]');
    });

    it('solves frames from the command line and prints the JSON result', async () => {
        const { log, error } = captureConsole();
        setArgv('solve', '--frames', '20,10', '--strategy', 'alternate', '--initial', 'true', '--config', configPath, '--progress');

        const exitCode = await createCli().execute();

        expect(exitCode).toBe(0);
        expect(log).toHaveBeenCalledTimes(1);
        const output = JSON.parse(String(log.mock.calls[0][0]));
        expect(output.status).toBe('solved');
        expect(output.targetFrames).toEqual([10, 20]);
        expect(output.assignment).toEqual([true, false]);
        expect(error).toHaveBeenCalledWith('Progress: 100%\t─|');
    });

    it('exits with 2 when the frames cannot all be hit', async () => {
        const { log } = captureConsole();
        setArgv('solve', '--frames', '10,11,12', '--strategy', 'alternate', '--config', configPath);

        expect(await createCli().execute()).toBe(2);
        expect(JSON.parse(String(log.mock.calls[0][0])).status).toBe('no-valid-placement');
    });

    it('exits with 3 when the node budget runs out', async () => {
        const { log } = captureConsole();
        setArgv('solve', '--frames', '10,11,12', '--max-nodes', '2', '--config', configPath);

        expect(await createCli().execute()).toBe(3);
        expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({ status: 'cancelled', reason: 'node-budget' });
    });

    it('reports bad flags as a solve failure', async () => {
        const { log, error } = captureConsole();

        setArgv('solve');
        expect(await createCli().execute()).toBe(1);
        expect(error).toHaveBeenLastCalledWith('solve failed: --frames is required (or use --stdin)');

        setArgv('solve', '--frames', '10', '--strategy', 'greedy');
        expect(await createCli().execute()).toBe(1);
        expect(error).toHaveBeenLastCalledWith('solve failed: unknown strategy "greedy"');

        setArgv('solve', '--frames', '10', '--initial', 'maybe');
        expect(await createCli().execute()).toBe(1);
        expect(error).toHaveBeenLastCalledWith('solve failed: --initial must be true or false');

        expect(log).not.toHaveBeenCalled();
    });

    it('runs a seed sweep and prints the summary', async () => {
        const { log } = captureConsole();
        setArgv('sweep', '--frames', '10,20', '--runs', '3', '--config', configPath);

        expect(await createCli().execute()).toBe(0);
        const output = JSON.parse(String(log.mock.calls[0][0]));
        expect(output.summary).toEqual({
            runCount: 3,
            solvedRuns: 3,
            solveRate: 1,
            averageNodesVisited: 2,
            maxNodesVisited: 2,
            deterministicCheck: true,
        });
    });

    it('reports a sweep without frames', async () => {
        const { error } = captureConsole();
        setArgv('sweep', '--runs', '3');

        expect(await createCli().execute()).toBe(1);
        expect(error).toHaveBeenCalledWith('sweep failed: --frames is required');
    });
});
