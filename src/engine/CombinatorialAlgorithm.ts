import { CombinatorialOptions } from '../types';
import { ConfigurationError } from '../errors';
import { Combination } from './Combination';
import { CombinationTable } from './CombinationTable';
import { GenerationAlgorithm } from './GenerationAlgorithm';
import { ParameterSet } from './ParameterSet';
import { shuffled } from './Random';

/**
 * Checks a combinatorial limit: a positive integer, or Infinity for no limit.
 *
 * @throws {ConfigurationError}
 */
export function assertValidLimit(limit: number): void {
    if (limit !== Infinity && (!Number.isInteger(limit) || limit < 1)) {
        throw new ConfigurationError('limit must be positive');
    }
}

/**
 * Generates every combination that satisfies all rules.
 *
 * The search backtracks over parameter positions in order and prunes a branch as soon as a
 * partition conflicts with any slot placed before it. When the valid set is larger than the
 * limit, a random subset of `limit` combinations is returned.
 *
 * Note: the valid set grows with the product of partition counts. Use with caution.
 */
export class CombinatorialAlgorithm extends GenerationAlgorithm {
    public readonly limit: number;

    constructor(options: CombinatorialOptions = {}) {
        super(options);
        const { limit = Infinity } = options;
        assertValidLimit(limit);
        this.limit = limit;
    }

    public generate(parameters: ParameterSet): CombinationTable {
        this.trace(`CombinatorialAlgorithm: enumerating ${parameters.size} parameters, limit ${this.limit}.`);
        const valid = this.enumerate(parameters);
        this.trace(`CombinatorialAlgorithm: found ${valid.length} valid combinations.`);

        if (valid.length <= this.limit) {
            return new CombinationTable(valid);
        }
        return new CombinationTable(shuffled(valid, this.random).slice(0, this.limit));
    }

    /**
     * Depth-first enumeration with an explicit cursor per parameter position.
     * Slots deeper than the current level are always empty.
     */
    private enumerate(parameters: ParameterSet): Combination[] {
        const results: Combination[] = [];
        const current = new Combination(parameters);
        const cursors = new Array<number>(parameters.size).fill(0);
        let level = 0;

        while (level >= 0) {
            if (level === parameters.size) {
                if (this.isValidCombination(current)) {
                    results.push(current.copy());
                }
                level--;
                continue;
            }

            const partitions = parameters.get(level).partitions;
            const next = cursors[level]++;
            if (next >= partitions.length) {
                cursors[level] = 0;
                current.clearValue(level);
                level--;
                continue;
            }

            const candidate = partitions[next];
            if (!current.fits(level, candidate)) continue;
            current.setValue(level, candidate);
            level++;
        }

        return results;
    }
}
