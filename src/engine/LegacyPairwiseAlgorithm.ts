import { GenerationOptions } from '../types';
import { GenerationError } from '../errors';
import { Combination } from './Combination';
import { CombinationTable } from './CombinationTable';
import { PairCandidates, PairCoverageAlgorithm, PairStatus } from './PairCoverage';
import { ParameterSet } from './ParameterSet';

/**
 * The earlier merge-based pairwise strategy, kept for comparison.
 *
 * Each combination starts empty and absorbs candidate pairs from the queue by merging them,
 * postponing candidates that would conflict or leave the combination impossible to complete,
 * before the remaining slots are completed.
 * It tends to produce more combinations than PairwiseAlgorithm.
 */
export class LegacyPairwiseAlgorithm extends PairCoverageAlgorithm {

    constructor(options: GenerationOptions = {}) {
        super(options);
    }

    public generate(parameters: ParameterSet): CombinationTable {
        this.trace(`LegacyPairwiseAlgorithm: starting with jump ${this.jump}, seed ${this.seed}.`);
        const table = new CombinationTable();
        const candidates = this.collectCandidates(parameters);

        while (candidates.queue.length > 0) {
            const combination = this.buildCombination(parameters, candidates);
            if (combination === null) continue;

            table.add(combination);
            const newlyCovered = this.markCovered(combination, candidates.coverage);
            this.trace(`LegacyPairwiseAlgorithm: ${combination.key} covers ${newlyCovered} new pairs, queue ${candidates.queue.length}.`);
        }

        this.trace(`LegacyPairwiseAlgorithm: generated ${table.size} combinations.`);
        return table;
    }

    /**
     * Builds one combination by merging candidates pulled from the queue at offsets stepped by
     * the jump. Postponed candidates go back to the queue for the next round, and so do the
     * merged ones if the combination is discarded.
     *
     * @returns The completed combination, or null if nothing could be built this round.
     */
    private buildCombination(parameters: ParameterSet, candidates: PairCandidates): Combination | null {
        const { queue, coverage } = candidates;
        const postponed: Combination[] = [];
        const absorbed: Combination[] = [];
        let current = new Combination(parameters);
        let offset = -this.jump;
        let conflicting = 0;

        while (!current.isFilled() && queue.length > 0) {
            offset = (offset + this.jump) % queue.length;
            const [candidate] = queue.splice(offset, 1);

            const key = candidate.key;
            if (coverage.get(key) === PairStatus.COVERED) {
                this.trace(` - skipping: ${key}`);
                continue;
            }
            if (!candidate.checkNoConflicts()) {
                this.trace(` - conflicting: ${key}`);
                conflicting++;
                postponed.push(candidate);
                continue;
            }

            const next = current.merge(candidate);
            if (next === null || !next.checkNoConflicts()) {
                this.trace(` - postponing: ${key}. Merge conflict? ${next === null}`);
                postponed.push(candidate);
                continue;
            }
            if (!this.canComplete(next)) {
                if (absorbed.length === 0) {
                    // reports the gap; no valid combination contains this candidate
                    this.completeCombination(next);
                    this.trace(` - dropping: ${key}`);
                } else {
                    this.trace(` - postponing: ${key}. Cannot be completed with ${current.key}`);
                    postponed.push(candidate);
                }
                continue;
            }
            current = next;
            absorbed.push(candidate);
        }

        queue.push(...postponed);

        if (absorbed.length === 0) {
            if (conflicting > 0) {
                throw new GenerationError(`All ${queue.length} remaining candidate pairs are conflicting; cannot build another combination.`);
            }
            return null;
        }

        if (!this.completeCombination(current)) {
            this.trace(`LegacyPairwiseAlgorithm: discarding incomplete combination ${current.key}.`);
            queue.push(...absorbed);
            return null;
        }
        return current;
    }
}
