import { isOppositeFace, makeMove, moveFace, movePower, type Move, type Power } from '../engine/moves';

// --- NOTATION UTILS ---

export const getInverseMove = (move: Move): Move => {
  const power = movePower(move);
  if (power === 2) return move; // R2' is just R2
  return makeMove(moveFace(move), power === 1 ? 3 : 1);
};

/** Moves that undo `moves` when applied after them */
export const invertSequence = (moves: readonly Move[]): Move[] => {
  return [...moves].reverse().map(getInverseMove);
};

/**
 * Combine two turns of the same face. Returns null when they cancel out.
 */
const mergeSameFace = (m1: Move, m2: Move): Move | null => {
  const sum = (movePower(m1) + movePower(m2)) % 4;
  if (sum === 0) return null;
  const power: Power = sum === 1 ? 1 : sum === 2 ? 2 : 3;
  return makeMove(moveFace(m1), power);
};

/**
 * Push `newMove` onto an already simplified stack and simplify again.
 *
 * Same-face turns merge (R R -> R2, R R' -> nothing), also across one
 * turn of the opposite face, since the two commute (R L R -> R2 L).
 */
export const simplifyMoveStack = (stack: readonly Move[], newMove: Move): Move[] => {
  const moves = [...stack];
  const face = moveFace(newMove);
  const last = moves.length - 1;

  let target = -1;
  if (last >= 0 && moveFace(moves[last]) === face) {
    target = last;
  } else if (last >= 1 && isOppositeFace(moveFace(moves[last]), face) && moveFace(moves[last - 1]) === face) {
    target = last - 1;
  }

  if (target === -1) {
    moves.push(newMove);
    return moves;
  }

  const merged = mergeSameFace(moves[target], newMove);
  if (merged === null) {
    moves.splice(target, 1);
  } else {
    moves[target] = merged;
  }
  return moves;
};

/** Simplify a whole sequence by feeding it through simplifyMoveStack */
export const simplifySequence = (moves: readonly Move[]): Move[] => {
  return moves.reduce<Move[]>((stack, move) => simplifyMoveStack(stack, move), []);
};
