export type SearchStrategy = 'random' | 'alternate';

export interface ArenaConfig {
    readonly width: number;
    readonly height: number;
}

export interface BallConfig {
    readonly x: number;
    readonly y: number;
    readonly size: number;
    readonly speed: number;
}

export interface PlatformConfig {
    readonly length: number;
    readonly thickness: number;
}

export interface CarveConfig {
    readonly margin: number;
}

export interface CameraConfig {
    readonly deadZone: number;
}

export interface SearchConfig {
    readonly strategy: SearchStrategy;
    readonly seed: number;
    readonly initialOrientation: boolean | null;
    readonly maxNodes: number | null;
}

export interface ChoreographyConfig {
    readonly arena: ArenaConfig;
    readonly ball: BallConfig;
    readonly platform: PlatformConfig;
    readonly carve: CarveConfig;
    readonly camera: CameraConfig;
    readonly search: SearchConfig;
}

export type ChoreographyConfigOverrides = {
    readonly [Section in keyof ChoreographyConfig]?: Partial<ChoreographyConfig[Section]>;
};

/**
 * Centralized defaults for the arena, the ball and the search. World units are arbitrary;
 * the values mirror a portrait video frame eight units wide.
 */
export const defaultChoreographyConfig = {
    arena: { width: 8, height: 15 },
    ball: { x: 4, y: 7, size: 0.6, speed: 0.35 },
    platform: { length: 1.2, thickness: 0.6 },
    carve: { margin: 0 },
    camera: { deadZone: 0.4 },
    search: {
        strategy: 'random',
        seed: 1,
        initialOrientation: null,
        maxNodes: null,
    },
} as const satisfies ChoreographyConfig;

const SEARCH_STRATEGIES: readonly SearchStrategy[] = ['random', 'alternate'];

export const isSearchStrategy = (value: unknown): value is SearchStrategy =>
    typeof value === 'string' && SEARCH_STRATEGIES.some((strategy) => strategy === value);

const requireFinite = (field: string, value: number): void => {
    if (!Number.isFinite(value)) {
        throw new RangeError(`${field} must be a finite number`);
    }
};

const requirePositive = (field: string, value: number): void => {
    requireFinite(field, value);
    if (value <= 0) {
        throw new RangeError(`${field} must be greater than zero`);
    }
};

const requireNonNegative = (field: string, value: number): void => {
    requireFinite(field, value);
    if (value < 0) {
        throw new RangeError(`${field} must not be negative`);
    }
};

export const validateChoreographyConfig = (config: ChoreographyConfig): ChoreographyConfig => {
    requirePositive('arena.width', config.arena.width);
    requirePositive('arena.height', config.arena.height);
    requireFinite('ball.x', config.ball.x);
    requireFinite('ball.y', config.ball.y);
    requirePositive('ball.size', config.ball.size);
    requireFinite('ball.speed', config.ball.speed);
    if (config.ball.speed === 0) {
        throw new RangeError('ball.speed must not be zero');
    }
    requirePositive('platform.length', config.platform.length);
    requirePositive('platform.thickness', config.platform.thickness);
    requireNonNegative('carve.margin', config.carve.margin);
    requireNonNegative('camera.deadZone', config.camera.deadZone);
    if (config.camera.deadZone >= 0.5) {
        throw new RangeError('camera.deadZone must be below 0.5');
    }
    if (!isSearchStrategy(config.search.strategy)) {
        throw new RangeError(`search.strategy must be one of ${SEARCH_STRATEGIES.join(', ')}`);
    }
    requireFinite('search.seed', config.search.seed);
    if (config.search.maxNodes !== null) {
        requirePositive('search.maxNodes', config.search.maxNodes);
    }
    return config;
};

/**
 * Layer overrides on top of the defaults, section by section, and validate the result.
 */
export const resolveChoreographyConfig = (
    overrides: ChoreographyConfigOverrides = {},
    base: ChoreographyConfig = defaultChoreographyConfig,
): ChoreographyConfig => {
    const resolved: ChoreographyConfig = {
        arena: { ...base.arena, ...overrides.arena },
        ball: { ...base.ball, ...overrides.ball },
        platform: { ...base.platform, ...overrides.platform },
        carve: { ...base.carve, ...overrides.carve },
        camera: { ...base.camera, ...overrides.camera },
        search: { ...base.search, ...overrides.search },
    };
    return validateChoreographyConfig(resolved);
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readSection = (source: Record<string, unknown>, key: string): Record<string, unknown> | undefined => {
    const section = source[key];
    if (section === undefined) {
        return undefined;
    }
    if (!isRecord(section)) {
        throw new TypeError(`${key} must be an object`);
    }
    return section;
};

const readNumber = (section: Record<string, unknown>, path: string, key: string): number | undefined => {
    const value = section[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'number') {
        throw new TypeError(`${path}.${key} must be a number`);
    }
    return value;
};

const pickNumbers = <Key extends string>(
    section: Record<string, unknown> | undefined,
    path: string,
    keys: readonly Key[],
): Partial<Record<Key, number>> | undefined => {
    if (!section) {
        return undefined;
    }
    const picked: Partial<Record<Key, number>> = {};
    for (const key of keys) {
        const value = readNumber(section, path, key);
        if (value !== undefined) {
            picked[key] = value;
        }
    }
    return picked;
};

const readStrategy = (value: unknown): SearchStrategy | undefined => {
    if (value === undefined) {
        return undefined;
    }
    if (!isSearchStrategy(value)) {
        throw new RangeError(`search.strategy must be one of ${SEARCH_STRATEGIES.join(', ')}`);
    }
    return value;
};

const readNullable = <T>(
    value: unknown,
    field: string,
    expected: string,
    guard: (candidate: unknown) => candidate is T,
): T | null | undefined => {
    if (value === undefined || value === null) {
        return value;
    }
    if (!guard(value)) {
        throw new TypeError(`${field} must be ${expected} or null`);
    }
    return value;
};

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isNumber = (value: unknown): value is number => typeof value === 'number';

const readSearch = (section: Record<string, unknown> | undefined): Partial<SearchConfig> | undefined => {
    if (!section) {
        return undefined;
    }
    const strategy = readStrategy(section.strategy);
    const seed = readNumber(section, 'search', 'seed');
    const initialOrientation = readNullable(section.initialOrientation, 'search.initialOrientation', 'a boolean', isBoolean);
    const maxNodes = readNullable(section.maxNodes, 'search.maxNodes', 'a number', isNumber);
    return {
        ...(strategy !== undefined ? { strategy } : {}),
        ...(seed !== undefined ? { seed } : {}),
        ...(initialOrientation !== undefined ? { initialOrientation } : {}),
        ...(maxNodes !== undefined ? { maxNodes } : {}),
    };
};

/**
 * Overrides from untyped JSON (a config file or a stdin payload). Unknown keys are ignored;
 * known keys of the wrong type throw.
 */
export const parseChoreographyOverrides = (value: unknown): ChoreographyConfigOverrides => {
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new TypeError('config must be an object');
    }
    return {
        arena: pickNumbers(readSection(value, 'arena'), 'arena', ['width', 'height']),
        ball: pickNumbers(readSection(value, 'ball'), 'ball', ['x', 'y', 'size', 'speed']),
        platform: pickNumbers(readSection(value, 'platform'), 'platform', ['length', 'thickness']),
        carve: pickNumbers(readSection(value, 'carve'), 'carve', ['margin']),
        camera: pickNumbers(readSection(value, 'camera'), 'camera', ['deadZone']),
        search: readSearch(readSection(value, 'search')),
    };
};
