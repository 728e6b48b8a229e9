import { Logger } from './utils/Logger';

export const DEFAULT_SCRAMBLE_LENGTH = 25;

export interface CubeConfig {
    debug: boolean;
    scrambleLength: number;
    /** Fixed PRNG seed; scrambles are non-deterministic when absent */
    seed: number | null;
}

const parseInteger = (name: string, raw: string | undefined): number | null => {
    if (raw === undefined || raw.trim() === '') return null;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        Logger.warn('Config', `Ignoring ${name}="${raw}": not an integer`);
        return null;
    }
    return value;
};

/**
 * Read settings from the environment.
 *
 * CUBE_DEBUG=true|1 turns on debug logging, CUBE_SCRAMBLE_LENGTH overrides the
 * default scramble length and CUBE_SEED pins the scramble PRNG.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): CubeConfig => {
    const scrambleLength = parseInteger('CUBE_SCRAMBLE_LENGTH', env.CUBE_SCRAMBLE_LENGTH);
    return {
        debug: env.CUBE_DEBUG === 'true' || env.CUBE_DEBUG === '1',
        scrambleLength: scrambleLength ?? DEFAULT_SCRAMBLE_LENGTH,
        seed: parseInteger('CUBE_SEED', env.CUBE_SEED),
    };
};
