import { GenerationOptions, Rule } from '../types';
import { ConfigurationError } from '../errors';
import { DEFAULT_COMBINATORIAL_LIMIT } from '../defaults';
import { CombinationTable } from './CombinationTable';
import { Parameter } from './Parameter';
import { ParameterSet } from './ParameterSet';
import { ValuePartition } from './Partition';
import { generateCombinatorial, generateLegacyPairwise, generatePairwise } from './TestGenerator';

/**
 * Fluent construction of a parameter set followed by generation.
 *
 * Example:
 *   const table = input()
 *       .parameter('Browser', [SimplePartition.of('Chrome'), SimplePartition.of('Firefox')])
 *       .parameter('OS', [SimplePartition.of('Windows'), SimplePartition.of('Linux')])
 *       .generatePairwise({ seed: 1 });
 */
export class InputBuilder {
    private readonly parameterList: Parameter[] = [];

    /**
     * Adds a parameter built from a name, its partitions and optional rules.
     */
    public parameter(name: string, partitions: readonly ValuePartition[], rules: readonly Rule[] = []): this {
        return this.add(new Parameter(name, partitions, rules));
    }

    /**
     * Adds already constructed parameters, in order.
     */
    public add(...parameters: Parameter[]): this {
        for (const parameter of parameters) {
            if (!(parameter instanceof Parameter)) {
                throw new ConfigurationError('parameter must not be null');
            }
            this.parameterList.push(parameter);
        }
        return this;
    }

    /**
     * @throws {ConfigurationError} If no parameter was added or names repeat.
     */
    public build(): ParameterSet {
        return new ParameterSet(this.parameterList);
    }

    public generatePairwise(options: GenerationOptions = {}): CombinationTable {
        return generatePairwise(this.build(), options);
    }

    public generateLegacyPairwise(options: GenerationOptions = {}): CombinationTable {
        return generateLegacyPairwise(this.build(), options);
    }

    public generateCombinatorial(limit: number = DEFAULT_COMBINATORIAL_LIMIT, options: GenerationOptions = {}): CombinationTable {
        return generateCombinatorial(this.build(), limit, options);
    }
}

/**
 * Starts a new input builder.
 */
export function input(): InputBuilder {
    return new InputBuilder();
}
