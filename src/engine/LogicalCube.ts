import { loadConfig, type CubeConfig } from '../config';
import { Logger } from '../utils/Logger';
import { createSeededRandom, type RandomSource } from '../utils/scramble';
import { CubeState } from './CubeState';
import { InvalidMoveError } from './errors';
import { toFaceletString } from './facelets';
import { lookup } from './MoveTable';
import { FACES, makeMove, parseMove, tokenize, type Move, type Power } from './moves';
import { Scrambler } from './Scrambler';

export interface CubeEvents {
    update: { move: Move; state: string };
    reset: { state: string };
    solved: { moveCount: number };
}

type Listener<T> = (data: T) => void;

type ListenerMap = { [K in keyof CubeEvents]: Set<Listener<CubeEvents[K]>> };

export interface LogicalCubeOptions {
    /** Random source for scrambles; takes precedence over `seed` */
    random?: RandomSource;
    /** Seed for a reproducible scramble sequence */
    seed?: number;
    config?: CubeConfig;
}

const DIRECTION_POWER: ReadonlyMap<number, Power> = new Map<number, Power>([
    [1, 1],
    [-1, 3],
    [2, 2],
    [-2, 2],
]);

/**
 * LogicalCube Engine
 *
 * Owns one cubie state and is the entry point for turning it: single moves,
 * move sequences, numeric face/direction turns and random scrambles.
 * Not safe to share between concurrent callers; give each its own instance.
 */
export class LogicalCube {
    private state: CubeState = CubeState.solved();
    private moveCount = 0;
    private readonly scrambler: Scrambler;
    private readonly scrambleLength: number;

    private listeners: ListenerMap = {
        update: new Set(),
        reset: new Set(),
        solved: new Set(),
    };

    constructor(options: LogicalCubeOptions = {}) {
        const config = options.config ?? loadConfig();
        if (config.debug && !Logger.isEnabled()) {
            Logger.enable();
        }
        const seed = options.seed ?? config.seed;
        const random = options.random ?? (seed !== null ? createSeededRandom(seed) : Math.random);
        this.scrambler = new Scrambler(random);
        this.scrambleLength = config.scrambleLength;
    }

    /**
     * Reset the cube to solved state
     */
    public reset() {
        this.state.reset();
        this.moveCount = 0;
        this.emit('reset', { state: this.getFaceletString() });
    }

    public isSolved(): boolean {
        return this.state.isSolved();
    }

    /**
     * Apply a single move, given as a Move or a token such as "R", "U'" or "F2".
     * Unknown tokens throw InvalidMoveError and leave the cube untouched.
     */
    public applyMove(move: Move | string) {
        const parsed = parseMove(move);
        this.state.apply(lookup(parsed));
        this.moveCount++;
        Logger.log('LogicalCube', `Applied ${parsed}`);
        this.emitUpdate(parsed);
    }

    /**
     * Apply a whitespace-separated sequence, left to right. Stops at the first
     * invalid token by throwing; moves before it remain applied.
     */
    public applyMoves(sequence: string) {
        for (const token of tokenize(sequence)) {
            this.applyMove(token);
        }
    }

    /**
     * Turn a face by index (U, D, R, L, F, B = 0..5). Direction 1 is clockwise,
     * -1 counter-clockwise and 2 or -2 a half turn.
     */
    public rotate(face: number, direction: number) {
        const faceName = Number.isInteger(face) ? FACES[face] : undefined;
        const power = DIRECTION_POWER.get(direction);
        if (faceName === undefined || power === undefined) {
            throw new InvalidMoveError(
                `${face}:${direction}`,
                `Invalid rotation: face ${face} (expected 0-5), direction ${direction} (expected 1, -1, 2 or -2)`
            );
        }
        this.applyMove(makeMove(faceName, power));
    }

    /**
     * Apply `length` random moves and return them as a space-separated string.
     */
    public scramble(length: number = this.scrambleLength): string {
        const moves = this.scrambler.generate(length);
        moves.forEach(move => this.applyMove(move));
        return moves.join(' ');
    }

    /** Snapshot of the current state; later moves do not affect it */
    public getState(): CubeState {
        return this.state.clone();
    }

    public getFaceletString(): string {
        return toFaceletString(this.state);
    }

    public toString(): string {
        return this.state.toString();
    }

    private emitUpdate(move: Move) {
        this.emit('update', { move, state: this.getFaceletString() });
        if (this.state.isSolved()) {
            Logger.log('LogicalCube', `Solved after ${this.moveCount} moves`);
            this.emit('solved', { moveCount: this.moveCount });
        }
    }

    // --- Event Emitter Implementation ---

    public on<K extends keyof CubeEvents>(event: K, callback: Listener<CubeEvents[K]>) {
        this.listeners[event].add(callback);
    }

    public off<K extends keyof CubeEvents>(event: K, callback: Listener<CubeEvents[K]>) {
        this.listeners[event].delete(callback);
    }

    private emit<K extends keyof CubeEvents>(event: K, data: CubeEvents[K]) {
        this.listeners[event].forEach(callback => {
            try {
                callback(data);
            } catch (e) {
                Logger.error('LogicalCube', `Error in listener for ${event}`, e);
            }
        });
    }
}
