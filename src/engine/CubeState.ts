import { permuteSlots } from './applyDefinition';
import {
    CORNER_COUNT,
    CORNER_TWISTS,
    EDGE_COUNT,
    EDGE_FLIPS,
    type CornerSlot,
    type EdgeSlot,
    type MoveDefinition,
} from './types';

const cornerSlot = (pieceIndex: number, orientation: number): CornerSlot => Object.freeze({ pieceIndex, orientation });
const edgeSlot = (pieceIndex: number, orientation: number): EdgeSlot => Object.freeze({ pieceIndex, orientation });

const solvedCorners = (): readonly CornerSlot[] =>
    Object.freeze(Array.from({ length: CORNER_COUNT }, (_, i) => cornerSlot(i, 0)));
const solvedEdges = (): readonly EdgeSlot[] =>
    Object.freeze(Array.from({ length: EDGE_COUNT }, (_, i) => edgeSlot(i, 0)));

type Slot = CornerSlot | EdgeSlot;

const isIdentity = (slots: readonly Slot[]): boolean =>
    slots.every((slot, i) => slot.pieceIndex === i && slot.orientation === 0);

/**
 * CubeState
 *
 * Permutation and orientation of the 8 corner and 12 edge slots. Each move
 * swaps in freshly computed slot arrays; the arrays and slots handed out by
 * the getters are frozen and never change afterwards.
 */
export class CubeState {
    private cornerSlots: readonly CornerSlot[];
    private edgeSlots: readonly EdgeSlot[];

    constructor(corners?: readonly CornerSlot[], edges?: readonly EdgeSlot[]) {
        if (corners !== undefined && corners.length !== CORNER_COUNT) {
            throw new RangeError(`Expected ${CORNER_COUNT} corner slots, got ${corners.length}`);
        }
        if (edges !== undefined && edges.length !== EDGE_COUNT) {
            throw new RangeError(`Expected ${EDGE_COUNT} edge slots, got ${edges.length}`);
        }
        this.cornerSlots = corners ? Object.freeze(corners.map(s => cornerSlot(s.pieceIndex, s.orientation))) : solvedCorners();
        this.edgeSlots = edges ? Object.freeze(edges.map(s => edgeSlot(s.pieceIndex, s.orientation))) : solvedEdges();
    }

    public static solved(): CubeState {
        return new CubeState();
    }

    public get corners(): readonly CornerSlot[] {
        return this.cornerSlots;
    }

    public get edges(): readonly EdgeSlot[] {
        return this.edgeSlots;
    }

    /**
     * Reset to solved state
     */
    public reset() {
        this.cornerSlots = solvedCorners();
        this.edgeSlots = solvedEdges();
    }

    public isSolved(): boolean {
        return isIdentity(this.cornerSlots) && isIdentity(this.edgeSlots);
    }

    /**
     * Apply a move definition in place. Both new arrays are computed from the
     * old ones before either is replaced.
     */
    public apply(definition: MoveDefinition) {
        const corners = permuteSlots(
            this.cornerSlots,
            definition.cornerPermutation,
            definition.cornerOrientationDelta,
            CORNER_TWISTS,
            cornerSlot
        );
        const edges = permuteSlots(
            this.edgeSlots,
            definition.edgePermutation,
            definition.edgeOrientationDelta,
            EDGE_FLIPS,
            edgeSlot
        );
        this.cornerSlots = Object.freeze(corners);
        this.edgeSlots = Object.freeze(edges);
    }

    public clone(): CubeState {
        return new CubeState(this.cornerSlots, this.edgeSlots);
    }

    public equals(other: CubeState): boolean {
        const same = (a: readonly Slot[], b: readonly Slot[]) =>
            a.length === b.length &&
            a.every((slot, i) => slot.pieceIndex === b[i].pieceIndex && slot.orientation === b[i].orientation);
        return same(this.cornerSlots, other.cornerSlots) && same(this.edgeSlots, other.edgeSlots);
    }

    /**
     * Diagnostic dump of every (pieceIndex, orientation) pair, corners first.
     */
    public toString(): string {
        const dump = (slots: readonly Slot[]) =>
            slots.map(s => `(${s.pieceIndex},${s.orientation})`).join(' ');
        return `corners: ${dump(this.cornerSlots)} | edges: ${dump(this.edgeSlots)}`;
    }
}
