import type { ValuePartition } from './engine/Partition';

/**
 * A compatibility rule between two value partitions.
 * Returns false when the two partitions must never appear in the same combination.
 *
 * Rules are evaluated in both argument orders, so a rule only needs to describe one direction.
 */
export type Rule = (left: ValuePartition, right: ValuePartition) => boolean;

/**
 * A predicate over a single partition, used to build rules.
 */
export type PartitionMatcher = (partition: ValuePartition) => boolean;

/**
 * Produces a fresh value on every read of a computed partition.
 */
export type ValueSupplier<T> = () => T;

/**
 * A row handed to external test runners: a description followed by one value per parameter.
 */
export type DataProviderRow = [description: string, ...values: unknown[]];

/**
 * Options shared by every generation algorithm.
 */
export interface GenerationOptions {
    /**
     * Seed for the random number generator that shuffles partitions and candidates.
     * Default: a random seed per algorithm instance.
     */
    seed?: number;
    /**
     * Step size used to walk the candidate queue of the pairwise algorithms.
     * Default: 3.
     */
    jump?: number;
    /**
     * Callback for trace logs of execution details.
     */
    onTrace?: (message: string) => void;
    /**
     * Callback for warnings about degraded results (e.g. a slot that could not be filled).
     * Default: console.warn.
     */
    onWarning?: (message: string) => void;
}

/**
 * Options for the exhaustive combinatorial algorithm.
 */
export interface CombinatorialOptions extends GenerationOptions {
    /**
     * Maximum number of combinations to return. Must be an integer of at least 1.
     * Default: Infinity (every valid combination).
     */
    limit?: number;
}
