/**
 * Core type definitions for the cubie model.
 *
 * Corner slots are indexed URF, UFL, ULB, UBR, DFR, DLF, DBL, DRB and edge
 * slots UR, UF, UL, UB, DR, DF, DL, DB, FR, FL, BL, BR. Piece i is the piece
 * that sits in slot i when the cube is solved.
 */

export const CORNER_COUNT = 8;
export const EDGE_COUNT = 12;

/** Corners twist in three states, edges flip in two */
export const CORNER_TWISTS = 3;
export const EDGE_FLIPS = 2;

export interface CornerSlot {
  /** Which corner piece (0-7) occupies the slot */
  readonly pieceIndex: number;

  /** Clockwise twist (0-2) relative to solved alignment */
  readonly orientation: number;
}

export interface EdgeSlot {
  /** Which edge piece (0-11) occupies the slot */
  readonly pieceIndex: number;

  /** Flip (0-1) relative to solved alignment */
  readonly orientation: number;
}

/**
 * Effect of one turn, in "pull" form: destination slot i receives whatever
 * was in slot `permutation[i]`, twisted/flipped by `orientationDelta[i]`.
 */
export interface MoveDefinition {
  readonly cornerPermutation: readonly number[];
  readonly cornerOrientationDelta: readonly number[];
  readonly edgePermutation: readonly number[];
  readonly edgeOrientationDelta: readonly number[];
}
