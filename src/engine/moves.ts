import { InvalidMoveError } from './errors';

export type Face = 'U' | 'D' | 'R' | 'L' | 'F' | 'B';

/** Face order used by numeric face indices (see LogicalCube.rotate) */
export const FACES: readonly Face[] = ['U', 'D', 'R', 'L', 'F', 'B'];

/** Clockwise quarter turns: 1 = base, 2 = half turn, 3 = prime */
export type Power = 1 | 2 | 3;

/**
 * The 18 outer-layer turns. Each value is its Singmaster token, so the
 * enumerated constant and the display string are the same thing.
 */
export enum Move {
    U = 'U',
    U2 = 'U2',
    U_PRIME = "U'",
    D = 'D',
    D2 = 'D2',
    D_PRIME = "D'",
    R = 'R',
    R2 = 'R2',
    R_PRIME = "R'",
    L = 'L',
    L2 = 'L2',
    L_PRIME = "L'",
    F = 'F',
    F2 = 'F2',
    F_PRIME = "F'",
    B = 'B',
    B2 = 'B2',
    B_PRIME = "B'",
}

export const ALL_MOVES: readonly Move[] = Object.values(Move);

const MOVE_BY_TOKEN: ReadonlyMap<string, Move> = new Map(ALL_MOVES.map(move => [move, move]));

const SUFFIX: Record<Power, string> = { 1: '', 2: '2', 3: "'" };

export const isMove = (token: string): token is Move => MOVE_BY_TOKEN.has(token);

/**
 * Map a token to its move. Only the exact canonical spelling is accepted:
 * no lowercase faces, no "R2'", no surrounding whitespace.
 */
export const parseMove = (token: string): Move => {
    const move = MOVE_BY_TOKEN.get(token);
    if (move === undefined) {
        throw new InvalidMoveError(token);
    }
    return move;
};

/** Split a move sequence on whitespace, dropping empty runs */
export const tokenize = (sequence: string): string[] => sequence.split(/\s+/).filter(m => m);

export const moveFace = (move: Move): Face => {
    const face = FACES.find(f => f === move.charAt(0));
    if (face === undefined) {
        throw new InvalidMoveError(move);
    }
    return face;
};

export const movePower = (move: Move): Power => {
    if (move.endsWith('2')) return 2;
    if (move.endsWith("'")) return 3;
    return 1;
};

export const makeMove = (face: Face, power: Power): Move => parseMove(face + SUFFIX[power]);

export const isOppositeFace = (a: Face, b: Face): boolean => {
    const pairs: [Face, Face][] = [['R', 'L'], ['U', 'D'], ['F', 'B']];
    return pairs.some(p => (p[0] === a && p[1] === b) || (p[0] === b && p[1] === a));
};
