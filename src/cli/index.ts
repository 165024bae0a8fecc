import { text } from 'node:stream/consumers';
import { createEventBus } from 'app/events';
import { isSearchStrategy, type ChoreographyConfigOverrides, type SearchConfig } from 'config/choreography';
import { createLineLogWriter, createLogger, type Logger } from 'util/log';
import {
    attachProgress,
    createSolveCommand,
    describeError,
    exitCodeForStatus,
    loadConfigOverrides,
    runSolve,
} from './solve';
import { runSweep } from './sweep';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

const USAGE = 'Usage: bounce-choreographer <solve|sweep> [options]';

interface ParsedSolveOptions {
    frames?: number[];
    seed?: number;
    strategy?: string;
    initial?: string;
    maxFrames?: number;
    maxNodes?: number;
    configPath?: string;
    progress: boolean;
    trajectory: boolean;
    stdin: boolean;
    verbose: boolean;
}

interface ParsedSweepOptions {
    frames?: number[];
    runs: number;
    seed?: number;
    strategy?: string;
    configPath?: string;
    verbose: boolean;
}

const parseFrameList = (value: string): number[] =>
    value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number);

const parseSolveArgs = (args: string[]): ParsedSolveOptions => {
    const options: ParsedSolveOptions = { progress: false, trajectory: false, stdin: false, verbose: false };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--frames' && i + 1 < args.length) {
            options.frames = parseFrameList(args[i + 1]);
            i++;
        } else if (arg === '--seed' && i + 1 < args.length) {
            options.seed = parseInt(args[i + 1], 10);
            i++;
        } else if (arg === '--strategy' && i + 1 < args.length) {
            options.strategy = args[i + 1];
            i++;
        } else if (arg === '--initial' && i + 1 < args.length) {
            options.initial = args[i + 1];
            i++;
        } else if (arg === '--max-frames' && i + 1 < args.length) {
            options.maxFrames = parseInt(args[i + 1], 10);
            i++;
        } else if (arg === '--max-nodes' && i + 1 < args.length) {
            options.maxNodes = parseInt(args[i + 1], 10);
            i++;
        } else if (arg === '--config' && i + 1 < args.length) {
            options.configPath = args[i + 1];
            i++;
        } else if (arg === '--progress') {
            options.progress = true;
        } else if (arg === '--trajectory') {
            options.trajectory = true;
        } else if (arg === '--stdin') {
            options.stdin = true;
        } else if (arg === '--verbose') {
            options.verbose = true;
        }
    }
    return options;
};

const parseSweepArgs = (args: string[]): ParsedSweepOptions => {
    const options: ParsedSweepOptions = { runs: 10, verbose: false };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--frames' && i + 1 < args.length) {
            options.frames = parseFrameList(args[i + 1]);
            i++;
        } else if (arg === '--runs' && i + 1 < args.length) {
            options.runs = parseInt(args[i + 1], 10);
            i++;
        } else if (arg === '--seed' && i + 1 < args.length) {
            options.seed = parseInt(args[i + 1], 10);
            i++;
        } else if (arg === '--strategy' && i + 1 < args.length) {
            options.strategy = args[i + 1];
            i++;
        } else if (arg === '--config' && i + 1 < args.length) {
            options.configPath = args[i + 1];
            i++;
        } else if (arg === '--verbose') {
            options.verbose = true;
        }
    }
    return options;
};

const parseInitialOrientation = (value: string | undefined): boolean | undefined => {
    if (value === undefined) {
        return undefined;
    }
    if (value === 'true' || value === 'false') {
        return value === 'true';
    }
    throw new RangeError('--initial must be true or false');
};

type SearchOverrides = { -readonly [Key in keyof SearchConfig]?: SearchConfig[Key] };

interface SearchFlags {
    readonly seed?: number;
    readonly strategy?: string;
    readonly initial?: string;
    readonly maxNodes?: number;
}

/**
 * Command-line flags win over the config file, section by section.
 */
const buildOverrides = async (configPath: string | undefined, flags: SearchFlags): Promise<ChoreographyConfigOverrides> => {
    const fromFile = configPath ? await loadConfigOverrides(configPath) : {};
    const search: SearchOverrides = { ...fromFile.search };

    if (flags.strategy !== undefined) {
        if (!isSearchStrategy(flags.strategy)) {
            throw new RangeError(`unknown strategy "${flags.strategy}"`);
        }
        search.strategy = flags.strategy;
    }
    if (flags.seed !== undefined) {
        search.seed = flags.seed;
    }
    const initial = parseInitialOrientation(flags.initial);
    if (initial !== undefined) {
        search.initialOrientation = initial;
    }
    if (flags.maxNodes !== undefined) {
        search.maxNodes = flags.maxNodes;
    }

    return { ...fromFile, search };
};

const createStderrLogger = (verbose: boolean): Logger =>
    createLogger('bounce', {
        writer: createLineLogWriter((line) => console.error(line)),
        minLevel: verbose ? 'debug' : 'info',
    });

const readProcessStdin = (): Promise<string> => text(process.stdin);

export function createCli(): CliCommand {
    const execute = async (): Promise<number> => {
        const args = process.argv.slice(2);
        if (args.length === 0) {
            console.error(USAGE);
            return 1;
        }

        const command = args[0];
        const restArgs = args.slice(1);

        if (command === 'solve') {
            const parsed = parseSolveArgs(restArgs);

            if (parsed.stdin) {
                const solveCommand = createSolveCommand(
                    {
                        readStdin: readProcessStdin,
                        writeStdout: async (output) => {
                            console.log(output);
                        },
                        writeStderr: (message) => {
                            console.error(message);
                        },
                    },
                    { progress: parsed.progress, logLevel: parsed.verbose ? 'debug' : 'info' },
                );
                return solveCommand.execute();
            }

            try {
                if (!parsed.frames) {
                    throw new RangeError('--frames is required (or use --stdin)');
                }
                const events = createEventBus();
                if (parsed.progress) {
                    attachProgress(events, (line) => console.error(line));
                }
                const result = runSolve(
                    {
                        targetFrames: parsed.frames,
                        maxFrames: parsed.maxFrames,
                        config: await buildOverrides(parsed.configPath, parsed),
                        trajectory: parsed.trajectory,
                    },
                    { logger: createStderrLogger(parsed.verbose), events },
                );
                console.log(JSON.stringify(result));
                return exitCodeForStatus(result.status);
            } catch (error) {
                console.error(`solve failed: ${describeError(error)}`);
                return 1;
            }
        }

        if (command === 'sweep') {
            const parsed = parseSweepArgs(restArgs);
            try {
                if (!parsed.frames) {
                    throw new RangeError('--frames is required');
                }
                const result = runSweep({
                    frames: parsed.frames,
                    runs: parsed.runs,
                    seed: parsed.seed,
                    config: await buildOverrides(parsed.configPath, { strategy: parsed.strategy }),
                    logger: createStderrLogger(parsed.verbose),
                });
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`sweep failed: ${describeError(error)}`);
                return 1;
            }
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}
