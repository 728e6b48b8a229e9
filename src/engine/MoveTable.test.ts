import { describe, it, expect } from 'vitest';
import { CubeState } from './CubeState';
import { InvalidMoveError } from './errors';
import { BASE_MOVES, MOVE_TABLE, buildMoveTable, derive, ensureInitialized, lookup } from './MoveTable';
import { ALL_MOVES, FACES, Move, makeMove } from './moves';
import { Scrambler } from './Scrambler';
import { getInverseMove } from '../utils/cube';
import { createSeededRandom } from '../utils/scramble';

const scrambledState = (seed: number, length = 30): CubeState => {
    const state = CubeState.solved();
    new Scrambler(createSeededRandom(seed)).generate(length).forEach(move => state.apply(lookup(move)));
    return state;
};

const isPermutation = (values: number[], size: number) =>
    [...values].sort((a, b) => a - b).every((value, i) => value === i) && values.length === size;

describe('MoveTable', () => {
    it('holds all 18 canonical moves', () => {
        expect(MOVE_TABLE.size).toBe(18);
        for (const move of ALL_MOVES) {
            expect(MOVE_TABLE.has(move)).toBe(true);
        }
    });

    it('ensureInitialized always returns the same table', () => {
        expect(ensureInitialized()).toBe(MOVE_TABLE);
        expect(ensureInitialized()).toBe(ensureInitialized());
    });

    it('keeps the authored quarter turns as the base entries', () => {
        for (const face of FACES) {
            expect(lookup(face)).toBe(BASE_MOVES[face]);
        }
    });

    it('freezes every definition', () => {
        const definition = lookup(Move.R2);
        expect(Object.isFrozen(definition)).toBe(true);
        expect(Object.isFrozen(definition.cornerPermutation)).toBe(true);
        expect(Object.isFrozen(definition.edgeOrientationDelta)).toBe(true);
    });

    it('exposes no way to overwrite an entry', () => {
        const table = ensureInitialized();
        const u = lookup(Move.U);

        expect(Reflect.get(table, 'set')).toBeUndefined();
        expect(Reflect.get(table, 'delete')).toBeUndefined();
        expect(Reflect.get(table, 'clear')).toBeUndefined();
        expect(Object.isFrozen(table)).toBe(true);
        expect(Reflect.set(table, 'get', () => lookup(Move.D))).toBe(false);

        expect(lookup(Move.U)).toBe(u);
        expect(lookup(Move.U)).not.toBe(lookup(Move.D));
    });

    it('iterates all entries through the read-only table', () => {
        expect([...MOVE_TABLE.keys()]).toEqual([...ALL_MOVES]);
        expect([...MOVE_TABLE]).toHaveLength(18);
        let visited = 0;
        MOVE_TABLE.forEach((definition, move, table) => {
            expect(table.get(move)).toBe(definition);
            visited++;
        });
        expect(visited).toBe(18);
    });

    it('builds equal tables on every call', () => {
        const table = buildMoveTable();
        for (const move of ALL_MOVES) {
            expect(table.get(move)).toEqual(MOVE_TABLE.get(move));
        }
    });

    it('looks up tokens and enum values alike', () => {
        expect(lookup("U'")).toBe(lookup(Move.U_PRIME));
    });

    it.each(['Q', 'u', "R2'", ' R', '', 'M', 'x', 'Rw'])('rejects %j', token => {
        expect(() => lookup(token)).toThrow(InvalidMoveError);
    });
});

describe('derive', () => {
    it('gives the identity for zero repetitions', () => {
        const identity = derive(BASE_MOVES.F, 0);
        expect(identity.cornerPermutation).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
        expect(identity.edgeOrientationDelta).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('composes the U cycle for half and inverse turns', () => {
        expect(derive(BASE_MOVES.U, 2).cornerPermutation).toEqual([2, 3, 0, 1, 4, 5, 6, 7]);
        expect(derive(BASE_MOVES.U, 3).cornerPermutation).toEqual([1, 2, 3, 0, 4, 5, 6, 7]);
        expect(derive(BASE_MOVES.U, 3).edgePermutation).toEqual([1, 2, 3, 0, 4, 5, 6, 7, 8, 9, 10, 11]);
    });

    it('leaves no twist or flip in half turns', () => {
        for (const face of FACES) {
            const half = lookup(makeMove(face, 2));
            expect(half.cornerOrientationDelta.every(d => d === 0)).toBe(true);
            expect(half.edgeOrientationDelta.every(d => d === 0)).toBe(true);
        }
    });

    it('returns to the identity after four repetitions', () => {
        for (const face of FACES) {
            expect(derive(BASE_MOVES[face], 4)).toEqual(derive(BASE_MOVES[face], 0));
        }
    });

    it('rejects negative or fractional repetition counts', () => {
        expect(() => derive(BASE_MOVES.U, -1)).toThrow(RangeError);
        expect(() => derive(BASE_MOVES.U, 1.5)).toThrow(RangeError);
    });
});

describe('move group properties', () => {
    it.each(ALL_MOVES)('%s followed by its inverse restores the state', move => {
        const state = scrambledState(11);
        const before = state.clone();
        const inverse = getInverseMove(move);

        state.apply(lookup(move));
        state.apply(lookup(inverse));

        expect(state.corners).toEqual(before.corners);
        expect(state.edges).toEqual(before.edges);
    });

    it.each(FACES)('%s applied four times returns to the prior state', face => {
        const state = scrambledState(23);
        const before = state.clone();
        for (let i = 0; i < 4; i++) state.apply(lookup(face));
        expect(state.equals(before)).toBe(true);
    });

    it.each(FACES)('%s applied twice equals its half turn', face => {
        const twice = scrambledState(5);
        const once = twice.clone();

        twice.apply(lookup(face));
        twice.apply(lookup(face));
        once.apply(lookup(makeMove(face, 2)));

        expect(twice.equals(once)).toBe(true);
    });

    it.each(ALL_MOVES)('%s unsolves a solved cube', move => {
        const state = CubeState.solved();
        state.apply(lookup(move));
        expect(state.isSolved()).toBe(false);
    });

    it('keeps permutations and orientation ranges closed over long sequences', () => {
        for (const seed of [1, 2, 3, 4, 5]) {
            const state = scrambledState(seed, 200);
            expect(isPermutation(state.corners.map(s => s.pieceIndex), 8)).toBe(true);
            expect(isPermutation(state.edges.map(s => s.pieceIndex), 12)).toBe(true);
            expect(state.corners.every(s => s.orientation >= 0 && s.orientation <= 2)).toBe(true);
            expect(state.edges.every(s => s.orientation === 0 || s.orientation === 1)).toBe(true);
        }
    });

    it('conserves total corner twist and edge flip', () => {
        const state = scrambledState(99, 100);
        const twist = state.corners.reduce((sum, s) => sum + s.orientation, 0);
        const flip = state.edges.reduce((sum, s) => sum + s.orientation, 0);
        expect(twist % 3).toBe(0);
        expect(flip % 2).toBe(0);
    });
});
