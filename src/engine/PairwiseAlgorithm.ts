import { GenerationOptions } from '../types';
import { GenerationError } from '../errors';
import { Combination } from './Combination';
import { CombinationTable } from './CombinationTable';
import { PairCoverageAlgorithm, PairStatus } from './PairCoverage';
import { ParameterSet } from './ParameterSet';

/**
 * Generates a set of combinations that covers every compatible pair of partitions across
 * every two parameters.
 *
 * Each combination is seeded with one uncovered candidate pair and completed slot by slot.
 * A candidate is only dropped once no valid combination contains it.
 * The result is a heuristic cover, not a minimal one. For a fixed seed the output is
 * deterministic.
 */
export class PairwiseAlgorithm extends PairCoverageAlgorithm {

    /**
     * @param options - Seed, jump (recommended values: 2-5) and logging callbacks.
     */
    constructor(options: GenerationOptions = {}) {
        super(options);
    }

    public generate(parameters: ParameterSet): CombinationTable {
        this.trace(`PairwiseAlgorithm: starting with jump ${this.jump}, seed ${this.seed}.`);
        const table = new CombinationTable();
        const candidates = this.collectCandidates(parameters);
        const coverage = candidates.coverage;
        const total = candidates.queue.length;
        let queue = candidates.queue;
        let cursor = 0;

        while (true) {
            queue = queue.filter(c => coverage.get(c.key) !== PairStatus.COVERED);
            if (queue.length === 0) break;

            let built: Combination | null = null;
            let builtAt = -1;
            const removed = new Set<number>();

            for (const index of this.traversalOrder(queue.length, cursor % queue.length)) {
                const candidate = queue[index];
                if (!candidate.checkNoConflicts()) {
                    this.trace(`PairwiseAlgorithm: skipping conflicting candidate ${candidate.key}.`);
                    continue;
                }

                const attempt = candidate.copy();
                if (this.completeCombination(attempt)) {
                    built = attempt;
                    builtAt = index;
                    break;
                }
                this.trace(`PairwiseAlgorithm: dropping candidate ${candidate.key}, no valid combination contains it.`);
                removed.add(index);
            }

            if (built === null && removed.size === 0) {
                throw new GenerationError(`All ${queue.length} remaining candidate pairs are conflicting; cannot build another combination.`);
            }

            if (built !== null) {
                removed.add(builtAt);
                table.add(built);
                this.markCovered(built, coverage);
                cursor = builtAt + this.jump;
            }
            queue = queue.filter((_, i) => !removed.has(i));

            this.trace(`PairwiseAlgorithm: ${table.size} combinations, ${queue.length}/${total} candidates left.`);
        }

        this.trace(`PairwiseAlgorithm: generated ${table.size} combinations.`);
        return table;
    }

    /**
     * Queue indices in visiting order: start at `start` and step by `jump`, moving on to the
     * next free index on collisions, so every index is visited exactly once.
     */
    private traversalOrder(length: number, start: number): number[] {
        const visited = new Array<boolean>(length).fill(false);
        const order: number[] = [];
        let index = start;
        for (let n = 0; n < length; n++) {
            while (visited[index]) index = (index + 1) % length;
            visited[index] = true;
            order.push(index);
            index = (index + this.jump) % length;
        }
        return order;
    }
}
