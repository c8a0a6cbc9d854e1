import { Combination } from './Combination';
import { GenerationAlgorithm } from './GenerationAlgorithm';
import { ParameterSet } from './ParameterSet';
import { shuffled } from './Random';

/**
 * Coverage state of a candidate pair.
 */
export enum PairStatus {
    /** Not yet part of any generated combination. */
    PENDING,
    /** Contained in at least one generated combination. */
    COVERED,
}

/**
 * The work list of a pairwise run: candidate pairs still to cover, and the coverage map keyed
 * by Combination.key.
 */
export interface PairCandidates {
    queue: Combination[];
    coverage: Map<string, PairStatus>;
}

/**
 * Shared candidate bookkeeping of the pairwise algorithms.
 */
export abstract class PairCoverageAlgorithm extends GenerationAlgorithm {

    /**
     * Builds one two-slot candidate for every compatible pair of partitions of every two
     * parameters. Partitions are shuffled so that the queue order varies between seeds.
     * A single-parameter set yields one single-slot candidate per partition.
     */
    protected collectCandidates(parameters: ParameterSet): PairCandidates {
        const queue: Combination[] = [];
        const coverage = new Map<string, PairStatus>();

        const enqueue = (candidate: Combination) => {
            const key = candidate.key;
            if (coverage.has(key) || !candidate.checkNoConflicts()) return;
            coverage.set(key, PairStatus.PENDING);
            queue.push(candidate);
        };

        if (parameters.size === 1) {
            for (const partition of shuffled(parameters.get(0).partitions, this.random)) {
                const single = new Combination(parameters);
                single.setValue(0, partition);
                enqueue(single);
            }
        }

        for (let i = 0; i < parameters.size; i++) {
            for (let j = i + 1; j < parameters.size; j++) {
                for (const first of shuffled(parameters.get(i).partitions, this.random)) {
                    for (const second of shuffled(parameters.get(j).partitions, this.random)) {
                        if (!first.isCompatibleWith(second)) continue;
                        const pair = new Combination(parameters);
                        pair.setValue(i, first);
                        pair.setValue(j, second);
                        enqueue(pair);
                    }
                }
            }
        }

        this.trace(`${this.constructor.name}: queued ${queue.length} candidate pairs.`);
        return { queue, coverage };
    }

    /**
     * Marks every pair of the combination as covered.
     *
     * @returns The number of pairs that were pending before.
     */
    protected markCovered(combination: Combination, coverage: Map<string, PairStatus>): number {
        let newlyCovered = 0;
        const parts = combination.size === 1 ? [combination] : combination.pairs();
        for (const part of parts) {
            const key = part.key;
            if (coverage.get(key) === PairStatus.PENDING) newlyCovered++;
            coverage.set(key, PairStatus.COVERED);
        }
        return newlyCovered;
    }
}
