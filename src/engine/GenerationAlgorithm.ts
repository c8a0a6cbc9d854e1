import { GenerationOptions } from '../types';
import { ConfigurationError, InconsistentCombinationError } from '../errors';
import { DEFAULT_JUMP } from '../defaults';
import { Combination } from './Combination';
import { CombinationTable } from './CombinationTable';
import { ParameterSet } from './ParameterSet';
import { mulberry32, randomSeed, RandomSource, shuffled } from './Random';

/**
 * Base class of every generation algorithm.
 *
 * Every combination an algorithm places in its result table is filled, and every pair of its
 * slots is mutually compatible.
 */
export abstract class GenerationAlgorithm {
    /** The seed actually used, reported so that a run can be reproduced. */
    public readonly seed: number;
    protected readonly random: RandomSource;
    protected readonly jump: number;
    private readonly onTrace?: (message: string) => void;
    private readonly onWarning: (message: string) => void;

    /**
     * @throws {ConfigurationError} If the jump is not a positive integer.
     */
    constructor(options: GenerationOptions = {}) {
        const { seed = randomSeed(), jump = DEFAULT_JUMP } = options;
        if (!Number.isInteger(jump) || jump < 1) {
            throw new ConfigurationError('jump must be a positive integer');
        }
        if (!Number.isFinite(seed)) {
            throw new ConfigurationError('seed must be a finite number');
        }
        this.seed = seed;
        this.random = mulberry32(seed);
        this.jump = jump;
        this.onTrace = options.onTrace;
        this.onWarning = options.onWarning ?? (message => console.warn(message));
    }

    /**
     * Generates combinations for the given parameters.
     */
    public abstract generate(parameters: ParameterSet): CombinationTable;

    /**
     * Checks that every pair of assigned slots in the combination is compatible.
     */
    public isValidCombination(combination: Combination): boolean {
        return combination.checkNoConflicts();
    }

    /**
     * Fills every empty slot so that all slots stay mutually compatible. Partitions are tried in
     * shuffled order and the search backtracks over the open slots, so a combination that can be
     * completed always is. Otherwise the gap is reported and the combination is left as it was.
     *
     * @returns true if the combination ends up filled.
     * @throws {InconsistentCombinationError} If the combination already contains a conflict.
     */
    protected completeCombination(combination: Combination): boolean {
        if (!combination.checkNoConflicts()) {
            throw new InconsistentCombinationError(
                `Combination should be initially consistent, with no conflicting values. It is not: ${combination}`
            );
        }
        const initial = combination.toString();

        const blocked = this.fillOpenSlots(combination);
        if (blocked < 0) return true;

        const parameter = combination.parameters.get(blocked);
        this.warn(`Failed to find a partition of parameter '${parameter.name}' compatible with combination ${initial}.`);
        return false;
    }

    /**
     * Checks, on a copy, whether some filled and conflict-free combination extends this one.
     */
    protected canComplete(combination: Combination): boolean {
        return combination.checkNoConflicts() && this.fillOpenSlots(combination.copy()) < 0;
    }

    /**
     * Depth-first search over the open slots with one cursor per slot.
     *
     * @returns -1 when every slot is filled, else the index of the deepest slot that no partition
     *  could fill. On failure the open slots are empty again.
     */
    private fillOpenSlots(combination: Combination): number {
        const open: number[] = [];
        for (let i = 0; i < combination.size; i++) {
            if (combination.getValue(i) === null) open.push(i);
        }
        const choices = open.map(i => shuffled(combination.parameters.get(i).partitions, this.random));
        const cursors = new Array<number>(open.length).fill(0);
        let level = 0;
        let deepest = -1;
        let blocked = -1;

        while (level >= 0 && level < open.length) {
            const slot = open[level];
            const candidates = choices[level];
            let placed = false;
            while (cursors[level] < candidates.length) {
                const candidate = candidates[cursors[level]++];
                if (combination.fits(slot, candidate)) {
                    combination.setValue(slot, candidate);
                    placed = true;
                    break;
                }
            }
            if (placed) {
                level++;
                continue;
            }
            if (level > deepest) {
                deepest = level;
                blocked = slot;
            }
            cursors[level] = 0;
            combination.clearValue(slot);
            level--;
        }

        return level < 0 ? blocked : -1;
    }

    protected trace(message: string): void {
        if (this.onTrace) this.onTrace(message);
    }

    protected warn(message: string): void {
        this.onWarning(message);
    }
}
