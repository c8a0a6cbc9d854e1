import { CombinatorialOptions, GenerationOptions } from '../types';
import { ConfigurationError } from '../errors';
import { CombinationTable } from './CombinationTable';
import { CombinatorialAlgorithm } from './CombinatorialAlgorithm';
import { GenerationAlgorithm } from './GenerationAlgorithm';
import { LegacyPairwiseAlgorithm } from './LegacyPairwiseAlgorithm';
import { PairwiseAlgorithm } from './PairwiseAlgorithm';
import { Parameter } from './Parameter';
import { ParameterSet } from './ParameterSet';
import { RulePropagator } from './RulePropagator';

export interface TestGeneratorOptions {
    /**
     * Propagate rules to every parameter they examine before generating.
     * Default: true.
     */
    propagateRules?: boolean;
    onTrace?: (message: string) => void;
}

/**
 * Runs generation algorithms over a parameter set whose rules have been propagated.
 *
 * Example:
 *   const generator = new TestGenerator([browser, os]);
 *   const table = generator.generate(new PairwiseAlgorithm({ seed: 42 }));
 */
export class TestGenerator {
    /** The effective input after rule propagation. */
    public readonly input: ParameterSet;
    private readonly onTrace?: (message: string) => void;
    private result: CombinationTable = new CombinationTable();

    /**
     * @throws {ConfigurationError} If the parameter list is missing, empty, or has duplicate names.
     */
    constructor(parameters: ParameterSet | readonly Parameter[], options: TestGeneratorOptions = {}) {
        const { propagateRules = true, onTrace } = options;
        this.onTrace = onTrace;
        const initial = ParameterSet.from(parameters);
        this.input = propagateRules ? new RulePropagator({ onTrace }).propagate(initial) : initial;
    }

    /**
     * Generates combinations with the given algorithm.
     */
    public generate(algorithm: GenerationAlgorithm): CombinationTable {
        if (!(algorithm instanceof GenerationAlgorithm)) {
            throw new ConfigurationError('algorithm must not be null');
        }
        if (this.onTrace) this.onTrace(`TestGenerator: generating with ${algorithm.constructor.name}.`);
        this.result = algorithm.generate(this.input);
        if (this.onTrace) this.onTrace(`TestGenerator: generated ${this.result.size} combinations.`);
        return this.result;
    }

    /**
     * The table produced by the last call to generate.
     */
    public get lastResult(): CombinationTable {
        return this.result;
    }

    /**
     * Size of the input space when no rules are applied.
     */
    public span(): number {
        return this.input.span();
    }
}

/**
 * Generates a pairwise cover of the parameters.
 */
export function generatePairwise(parameters: ParameterSet | readonly Parameter[], options: GenerationOptions = {}): CombinationTable {
    const algorithm = new PairwiseAlgorithm(options);
    return new TestGenerator(parameters, { onTrace: options.onTrace }).generate(algorithm);
}

/**
 * Generates a pairwise cover with the legacy merging strategy.
 */
export function generateLegacyPairwise(parameters: ParameterSet | readonly Parameter[], options: GenerationOptions = {}): CombinationTable {
    const algorithm = new LegacyPairwiseAlgorithm(options);
    return new TestGenerator(parameters, { onTrace: options.onTrace }).generate(algorithm);
}

/**
 * Generates all valid combinations of the parameters, at most `limit` of them.
 *
 * @throws {ConfigurationError} If the limit is not a positive integer.
 */
export function generateCombinatorial(
    parameters: ParameterSet | readonly Parameter[],
    limit: number,
    options: Omit<CombinatorialOptions, 'limit'> = {}
): CombinationTable {
    const algorithm = new CombinatorialAlgorithm({ ...options, limit });
    return new TestGenerator(parameters, { onTrace: options.onTrace }).generate(algorithm);
}
