import { Logger } from '../utils/Logger';
import type { RandomSource } from '../utils/scramble';
import { DEFAULT_SCRAMBLE_LENGTH } from '../config';
import { ALL_MOVES, type Move } from './moves';

/**
 * Draws moves uniformly, with replacement, from all 18 turns. Consecutive
 * draws are independent, so "R" followed by "R'" is a legal outcome.
 */
export class Scrambler {
    private readonly random: RandomSource;

    constructor(random: RandomSource = Math.random) {
        this.random = random;
    }

    public next(): Move {
        const index = Math.min(Math.floor(this.random() * ALL_MOVES.length), ALL_MOVES.length - 1);
        return ALL_MOVES[index];
    }

    /**
     * Draw `length` moves; zero, negative or non-finite lengths give none.
     */
    public generate(length: number = DEFAULT_SCRAMBLE_LENGTH): Move[] {
        if (!Number.isFinite(length) || length <= 0) {
            return [];
        }
        const moves: Move[] = [];
        for (let i = 0; i < Math.floor(length); i++) {
            moves.push(this.next());
        }
        Logger.log('Scrambler', `Generated ${moves.length} moves: ${moves.join(' ')}`);
        return moves;
    }
}
