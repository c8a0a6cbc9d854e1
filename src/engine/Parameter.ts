import { Rule } from '../types';
import { ConfigurationError } from '../errors';
import { ValuePartition } from './Partition';

/**
 * A test parameter: a named, ordered set of value partitions plus the rules that constrain
 * which partitions of other parameters they may be combined with.
 *
 * Example:
 *   const browser = new Parameter('Browser', [SimplePartition.of('Chrome'), SimplePartition.of('Safari')], [
 *       requires(nameIs('Safari'), 'OS', nameIs('macOS')),
 *   ]);
 */
export class Parameter {
    public readonly name: string;
    private readonly partitionList: ValuePartition[];
    private readonly rules: Rule[];

    /**
     * Creates a new Parameter and attaches every partition to it.
     *
     * @param name - Unique name of the parameter within its parameter set.
     * @param partitions - The equivalence partitions, possibly empty.
     * @param rules - Compatibility rules declared on this parameter.
     * @throws {ConfigurationError} If the name is empty, a list is missing, or partition names repeat.
     */
    constructor(name: string, partitions: readonly ValuePartition[], rules: readonly Rule[] = []) {
        if (typeof name !== 'string' || name.length === 0) {
            throw new ConfigurationError('Parameter name must be a non-empty string.');
        }
        if (!Array.isArray(partitions)) {
            throw new ConfigurationError(`Parameter '${name}' requires a partition list.`);
        }
        if (!Array.isArray(rules)) {
            throw new ConfigurationError(`Parameter '${name}' requires a rule list.`);
        }

        const names = new Set<string>();
        for (const partition of partitions) {
            if (!(partition instanceof ValuePartition)) {
                throw new ConfigurationError(`Parameter '${name}' contains an invalid partition.`);
            }
            if (partition.parameter !== undefined) {
                throw new ConfigurationError(`Partition '${partition.name}' already belongs to parameter '${partition.parameter.name}'.`);
            }
            if (names.has(partition.name)) {
                throw new ConfigurationError(`Parameter '${name}' has duplicate partition '${partition.name}'.`);
            }
            names.add(partition.name);
        }
        for (const rule of rules) {
            if (typeof rule !== 'function') {
                throw new ConfigurationError(`Parameter '${name}' contains a rule that is not a function.`);
            }
        }

        this.name = name;
        this.partitionList = [...partitions];
        this.rules = [...rules];
        for (const partition of this.partitionList) {
            partition.attachTo(this);
        }
    }

    /**
     * Creates a parameter without rules.
     */
    public static of(name: string, ...partitions: ValuePartition[]): Parameter {
        return new Parameter(name, partitions);
    }

    public get partitions(): readonly ValuePartition[] {
        return this.partitionList;
    }

    /**
     * The rules declared on this parameter.
     */
    public get dependencies(): readonly Rule[] {
        return this.rules;
    }

    public getPartition(name: string): ValuePartition | undefined {
        return this.partitionList.find(p => p.name === name);
    }

    public hasRule(rule: Rule): boolean {
        return this.rules.includes(rule);
    }

    /**
     * Checks two partitions against every rule of this parameter, in both argument orders.
     *
     * @returns true if no rule rejects the pair.
     */
    public areCompatible(first: ValuePartition, second: ValuePartition): boolean {
        for (const rule of this.rules) {
            if (!rule(first, second) || !rule(second, first)) {
                return false;
            }
        }
        return true;
    }

    public toString(): string {
        return this.name;
    }
}
