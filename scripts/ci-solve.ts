import { runSolve, type SolveInput } from 'cli/solve';
import { createLogger } from 'util/log';

const INPUT: SolveInput = {
    targetFrames: [10, 20],
    config: {
        arena: { width: 100, height: 100 },
        ball: { x: 0, y: 0, size: 10, speed: 5 },
        platform: { length: 20, thickness: 4 },
        search: { strategy: 'alternate', initialOrientation: true },
    },
};

const EXPECTED = {
    status: 'solved',
    assignment: [true, false],
    platforms: [
        { x: 45, y: 58, width: 20, height: 4 },
        { x: 108, y: -12, width: 4, height: 20 },
    ],
    walls: [
        { x: 45, y: -12, width: 20, height: 20 },
        { x: 108, y: 8, width: 4, height: 50 },
        { x: 112, y: -212, width: 200, height: 474 },
        { x: -155, y: -212, width: 467, height: 200 },
        { x: -155, y: 62, width: 467, height: 200 },
        { x: 65, y: 58, width: 47, height: 4 },
    ],
    nodesVisited: 2,
};

const serialize = (value: unknown): string => JSON.stringify(value, null, 2);

const fail = (message: string, details?: { expected?: unknown; actual?: unknown }) => {
    console.error(`[solve:verify] ${message}`);
    if (details?.expected !== undefined) {
        console.error(`[solve:verify] expected: ${serialize(details.expected)}`);
    }
    if (details?.actual !== undefined) {
        console.error(`[solve:verify] actual: ${serialize(details.actual)}`);
    }
    process.exit(1);
};

const main = (): void => {
    const logger = createLogger('solve:verify', { minLevel: 'warn' });
    const first = runSolve(INPUT, { logger });
    const second = runSolve(INPUT, { logger });

    if (serialize(first) !== serialize(second)) {
        fail('solve produced different results across runs for the same input', {
            expected: first,
            actual: second,
        });
    }

    const actual = {
        status: first.status,
        assignment: first.assignment,
        platforms: first.platforms?.map((platform) => platform.rect),
        walls: first.walls,
        nodesVisited: first.stats.nodesVisited,
    };

    if (serialize(actual) !== serialize(EXPECTED)) {
        fail('solve baseline changed', {
            expected: EXPECTED,
            actual,
        });
    }

    console.log(
        `[solve:verify] Deterministic layout confirmed for frames ${INPUT.targetFrames?.join(',') ?? 'none'}. platforms=${actual.platforms?.length ?? 0}, walls=${first.walls?.length ?? 0}.`,
    );
};

try {
    main();
} catch (error) {
    fail(`unexpected error: ${error instanceof Error ? error.message : String(error)}`);
}
