/**
 * Raised when a token is not one of the 18 outer-layer turns
 * (face letter U, D, R, L, F or B, optionally followed by ' or 2).
 */
export class InvalidMoveError extends Error {
    readonly token: string;

    constructor(token: string, message: string = `Invalid move: "${token}"`) {
        super(message);
        this.name = 'InvalidMoveError';
        this.token = token;
    }
}
