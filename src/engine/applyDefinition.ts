import type { CubeState } from './CubeState';
import type { MoveDefinition } from './types';

interface Slot {
    readonly pieceIndex: number;
    readonly orientation: number;
}

/**
 * Pull every destination slot from its source slot. `slots` is only read;
 * the result is a new array, so no slot is overwritten before it is read.
 */
export const permuteSlots = <T extends Slot>(
    slots: readonly T[],
    permutation: readonly number[],
    orientationDelta: readonly number[],
    modulus: number,
    make: (pieceIndex: number, orientation: number) => T
): T[] => {
    const next: T[] = [];
    for (let i = 0; i < slots.length; i++) {
        const source = slots[permutation[i]];
        next.push(make(source.pieceIndex, (source.orientation + orientationDelta[i]) % modulus));
    }
    return next;
};

/**
 * Pure move application: returns the state reached by applying `definition`
 * to `state`, leaving `state` untouched.
 */
export const applyDefinition = (state: CubeState, definition: MoveDefinition): CubeState => {
    const next = state.clone();
    next.apply(definition);
    return next;
};
