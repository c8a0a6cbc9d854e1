/**
 * Base error class for the pairwise generation library.
 */
export class PairwiseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PairwiseError';
    }
}

/**
 * Thrown when a parameter, partition, combination or generation call is given invalid arguments
 * (e.g., empty names, duplicate names, a non-positive limit).
 */
export class ConfigurationError extends PairwiseError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when an algorithm is asked to extend a combination that already contains incompatible values.
 */
export class InconsistentCombinationError extends PairwiseError {
    constructor(message: string) {
        super(message);
        this.name = 'InconsistentCombinationError';
    }
}

/**
 * Thrown when generation cannot make progress because every remaining candidate conflicts.
 */
export class GenerationError extends PairwiseError {
    constructor(message: string) {
        super(message);
        this.name = 'GenerationError';
    }
}
