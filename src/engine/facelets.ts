import type { CubeState } from './CubeState';
import type { Face } from './moves';

/**
 * Sticker projection of a cubie state.
 *
 * Facelets are numbered face by face in U, R, F, D, L, B order, nine per face
 * in reading order (U1..U9 = 0..8, R1..R9 = 9..17, and so on). A facelet
 * string holds, for each sticker, the letter of the face whose center shares
 * its color.
 */

export const FACELET_FACE_ORDER: readonly Face[] = ['U', 'R', 'F', 'D', 'L', 'B'];

export const SOLVED_FACELETS = 'UUUUUUUUURRRRRRRRRFFFFFFFFFDDDDDDDDDLLLLLLLLLBBBBBBBBB';

// Sticker positions of each corner slot, starting from its U/D sticker
const CORNER_FACELETS: readonly (readonly [number, number, number])[] = [
    [8, 9, 20], // URF
    [6, 18, 38], // UFL
    [0, 36, 47], // ULB
    [2, 45, 11], // UBR
    [29, 26, 15], // DFR
    [27, 44, 24], // DLF
    [33, 53, 42], // DBL
    [35, 17, 51], // DRB
];

const CORNER_COLORS: readonly (readonly [Face, Face, Face])[] = [
    ['U', 'R', 'F'],
    ['U', 'F', 'L'],
    ['U', 'L', 'B'],
    ['U', 'B', 'R'],
    ['D', 'F', 'R'],
    ['D', 'L', 'F'],
    ['D', 'B', 'L'],
    ['D', 'R', 'B'],
];

// Reference sticker first: U/D for the top and bottom layers, F/B for the middle one
const EDGE_FACELETS: readonly (readonly [number, number])[] = [
    [5, 10], // UR
    [7, 19], // UF
    [3, 37], // UL
    [1, 46], // UB
    [32, 16], // DR
    [28, 25], // DF
    [30, 43], // DL
    [34, 52], // DB
    [23, 12], // FR
    [21, 41], // FL
    [50, 39], // BL
    [48, 14], // BR
];

const EDGE_COLORS: readonly (readonly [Face, Face])[] = [
    ['U', 'R'],
    ['U', 'F'],
    ['U', 'L'],
    ['U', 'B'],
    ['D', 'R'],
    ['D', 'F'],
    ['D', 'L'],
    ['D', 'B'],
    ['F', 'R'],
    ['F', 'L'],
    ['B', 'L'],
    ['B', 'R'],
];

const project = (state: CubeState): Face[] => {
    const facelets: Face[] = [];
    FACELET_FACE_ORDER.forEach((face, f) => {
        for (let i = 0; i < 9; i++) facelets[f * 9 + i] = face;
    });

    state.corners.forEach((slot, i) => {
        for (let n = 0; n < 3; n++) {
            facelets[CORNER_FACELETS[i][(n + slot.orientation) % 3]] = CORNER_COLORS[slot.pieceIndex][n];
        }
    });
    state.edges.forEach((slot, i) => {
        for (let n = 0; n < 2; n++) {
            facelets[EDGE_FACELETS[i][(n + slot.orientation) % 2]] = EDGE_COLORS[slot.pieceIndex][n];
        }
    });
    return facelets;
};

/**
 * 54-character facelet string for the given state. The solved cube maps to
 * SOLVED_FACELETS.
 */
export const toFaceletString = (state: CubeState): string => project(state).join('');

export type ColorScheme = Readonly<Record<Face, string>>;

/** White top, green front */
export const DEFAULT_COLOR_SCHEME: ColorScheme = Object.freeze({
    U: 'W',
    D: 'Y',
    F: 'G',
    B: 'B',
    R: 'R',
    L: 'O',
});

/**
 * Sticker colors per face, nine each in reading order, for a display adapter.
 */
export const toStickerColors = (
    state: CubeState,
    scheme: ColorScheme = DEFAULT_COLOR_SCHEME
): Record<Face, string[]> => {
    const facelets = project(state);
    const colors: Record<Face, string[]> = { U: [], R: [], F: [], D: [], L: [], B: [] };
    FACELET_FACE_ORDER.forEach((face, f) => {
        colors[face] = facelets.slice(f * 9, f * 9 + 9).map(sticker => scheme[sticker]);
    });
    return colors;
};
