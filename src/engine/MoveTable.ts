import { CubeState } from './CubeState';
import { InvalidMoveError } from './errors';
import { ALL_MOVES, FACES, makeMove, parseMove, type Face, type Move } from './moves';
import type { MoveDefinition } from './types';

const freeze = (definition: MoveDefinition): MoveDefinition =>
    Object.freeze({
        cornerPermutation: Object.freeze([...definition.cornerPermutation]),
        cornerOrientationDelta: Object.freeze([...definition.cornerOrientationDelta]),
        edgePermutation: Object.freeze([...definition.edgePermutation]),
        edgeOrientationDelta: Object.freeze([...definition.edgeOrientationDelta]),
    });

/**
 * Clockwise quarter turns, looking at the turned face.
 *
 * Corners: URF=0 UFL=1 ULB=2 UBR=3 DFR=4 DLF=5 DBL=6 DRB=7
 * Edges:   UR=0 UF=1 UL=2 UB=3 DR=4 DF=5 DL=6 DB=7 FR=8 FL=9 BL=10 BR=11
 *
 * These six tables are the only authored move data; every half turn and
 * counter-clockwise turn is derived from them.
 */
export const BASE_MOVES: Readonly<Record<Face, MoveDefinition>> = Object.freeze({
    U: freeze({
        cornerPermutation: [3, 0, 1, 2, 4, 5, 6, 7],
        cornerOrientationDelta: [0, 0, 0, 0, 0, 0, 0, 0],
        edgePermutation: [3, 0, 1, 2, 4, 5, 6, 7, 8, 9, 10, 11],
        edgeOrientationDelta: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
    }),
    D: freeze({
        cornerPermutation: [0, 1, 2, 3, 5, 6, 7, 4],
        cornerOrientationDelta: [0, 0, 0, 0, 0, 0, 0, 0],
        edgePermutation: [0, 1, 2, 3, 5, 6, 7, 4, 8, 9, 10, 11],
        edgeOrientationDelta: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
    }),
    R: freeze({
        cornerPermutation: [4, 1, 2, 0, 7, 5, 6, 3],
        cornerOrientationDelta: [2, 0, 0, 1, 1, 0, 0, 2],
        edgePermutation: [8, 1, 2, 3, 11, 5, 6, 7, 4, 9, 10, 0],
        edgeOrientationDelta: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
    }),
    L: freeze({
        cornerPermutation: [0, 2, 6, 3, 4, 1, 5, 7],
        cornerOrientationDelta: [0, 1, 2, 0, 0, 2, 1, 0],
        edgePermutation: [0, 1, 10, 3, 4, 5, 9, 7, 8, 2, 6, 11],
        edgeOrientationDelta: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
    }),
    F: freeze({
        cornerPermutation: [1, 5, 2, 3, 0, 4, 6, 7],
        cornerOrientationDelta: [1, 2, 0, 0, 2, 1, 0, 0],
        edgePermutation: [0, 9, 2, 3, 4, 8, 6, 7, 1, 5, 10, 11],
        edgeOrientationDelta: [0, 1, 0, 0, 0, 1, 0, 0, 1, 1, 0, 0],
    }),
    B: freeze({
        cornerPermutation: [0, 1, 3, 7, 4, 5, 2, 6],
        cornerOrientationDelta: [0, 0, 1, 2, 0, 0, 2, 1],
        edgePermutation: [0, 1, 2, 11, 4, 5, 6, 10, 8, 9, 3, 7],
        edgeOrientationDelta: [0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 1, 1],
    }),
});

/**
 * Compose `base` with itself `repetitions` times.
 *
 * A solved cube is turned `repetitions` times; because it started from the
 * identity, the piece now in slot i is exactly the composed permutation's
 * source for slot i, and its accumulated twist/flip is the composed delta.
 */
export const derive = (base: MoveDefinition, repetitions: number): MoveDefinition => {
    if (!Number.isInteger(repetitions) || repetitions < 0) {
        throw new RangeError(`Repetitions must be a non-negative integer, got ${repetitions}`);
    }
    const state = CubeState.solved();
    for (let i = 0; i < repetitions; i++) {
        state.apply(base);
    }
    return freeze({
        cornerPermutation: state.corners.map(s => s.pieceIndex),
        cornerOrientationDelta: state.corners.map(s => s.orientation),
        edgePermutation: state.edges.map(s => s.pieceIndex),
        edgeOrientationDelta: state.edges.map(s => s.orientation),
    });
};

/**
 * Frozen read-only facade over a map. The map itself stays private to the
 * closure, so there is no `set`, `delete` or `clear` to reach.
 */
const readonlyView = <K, V>(map: Map<K, V>): ReadonlyMap<K, V> => {
    const view: ReadonlyMap<K, V> = Object.freeze({
        get size() {
            return map.size;
        },
        get: (key: K) => map.get(key),
        has: (key: K) => map.has(key),
        forEach: (callback: (value: V, key: K, table: ReadonlyMap<K, V>) => void) => {
            map.forEach((value, key) => callback(value, key, view));
        },
        entries: () => map.entries(),
        keys: () => map.keys(),
        values: () => map.values(),
        [Symbol.iterator]: () => map.entries(),
    });
    return view;
};

/**
 * Build all 18 definitions: each authored quarter turn, plus its half turn
 * (two repetitions) and its inverse (three, since a quarter turn has order 4).
 */
export const buildMoveTable = (): ReadonlyMap<Move, MoveDefinition> => {
    const table = new Map<Move, MoveDefinition>();
    for (const face of FACES) {
        const base = BASE_MOVES[face];
        table.set(makeMove(face, 1), base);
        table.set(makeMove(face, 2), derive(base, 2));
        table.set(makeMove(face, 3), derive(base, 3));
    }
    if (table.size !== ALL_MOVES.length) {
        throw new Error(`Move table has ${table.size} entries, expected ${ALL_MOVES.length}`);
    }
    return readonlyView(table);
};

/** Built once when the module loads; read-only afterwards */
export const MOVE_TABLE: ReadonlyMap<Move, MoveDefinition> = buildMoveTable();

/**
 * Idempotent accessor for the shared table. The table is built eagerly, so
 * every call returns the same fully populated instance.
 */
export const ensureInitialized = (): ReadonlyMap<Move, MoveDefinition> => MOVE_TABLE;

/**
 * Definition for a move or token; throws InvalidMoveError for anything that
 * is not one of the 18 canonical tokens.
 */
export const lookup = (name: string | Move): MoveDefinition => {
    const definition = MOVE_TABLE.get(parseMove(name));
    if (definition === undefined) {
        throw new InvalidMoveError(name);
    }
    return definition;
};
