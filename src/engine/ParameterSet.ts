import { Rule } from '../types';
import { ConfigurationError } from '../errors';
import { Parameter } from './Parameter';

/**
 * The input domain to cover: an ordered list of parameters with unique names.
 * Slot `i` of every combination built from this set belongs to the parameter at index `i`.
 *
 * A set may carry rules propagated to its parameters on top of the ones they declare; the
 * parameters themselves are never modified.
 */
export class ParameterSet implements Iterable<Parameter> {
    private readonly parameters: readonly Parameter[];
    private readonly propagated: ReadonlyMap<Parameter, readonly Rule[]>;

    /**
     * @param parameters - The parameters, in slot order.
     * @param propagated - Extra rules per parameter, added after its declared ones.
     * @throws {ConfigurationError} If the list is missing, empty, or contains duplicate names.
     */
    constructor(parameters: readonly Parameter[], propagated: ReadonlyMap<Parameter, readonly Rule[]> = new Map()) {
        if (!Array.isArray(parameters)) {
            throw new ConfigurationError('A parameter list is required.');
        }
        if (parameters.length === 0) {
            throw new ConfigurationError('At least one parameter is required.');
        }

        const names = new Set<string>();
        for (const parameter of parameters) {
            if (!(parameter instanceof Parameter)) {
                throw new ConfigurationError('Parameter list contains an invalid parameter.');
            }
            if (names.has(parameter.name)) {
                throw new ConfigurationError(`Duplicate parameter name found: ${parameter.name}`);
            }
            names.add(parameter.name);
        }

        for (const parameter of propagated.keys()) {
            if (!parameters.includes(parameter)) {
                throw new ConfigurationError(`Rules were propagated to '${parameter.name}', which is not in the set.`);
            }
        }

        this.parameters = [...parameters];
        this.propagated = new Map(propagated);
    }

    /**
     * Accepts either an existing set or a plain list of parameters.
     */
    public static from(parameters: ParameterSet | readonly Parameter[]): ParameterSet {
        if (parameters instanceof ParameterSet) return parameters;
        return new ParameterSet(parameters);
    }

    public get size(): number {
        return this.parameters.length;
    }

    public get(index: number): Parameter {
        const parameter = this.parameters[index];
        if (parameter === undefined) {
            throw new ConfigurationError(`Parameter index ${index} out of bounds for length ${this.parameters.length}.`);
        }
        return parameter;
    }

    public find(name: string): Parameter | undefined {
        return this.parameters.find(p => p.name === name);
    }

    public indexOf(parameter: Parameter): number {
        return this.parameters.indexOf(parameter);
    }

    /**
     * The rules consulted for a parameter of this set: its declared rules, then propagated ones.
     */
    public dependenciesOf(parameter: Parameter): readonly Rule[] {
        const extra = this.propagated.get(parameter);
        return extra ? [...parameter.dependencies, ...extra] : parameter.dependencies;
    }

    public toArray(): readonly Parameter[] {
        return this.parameters;
    }

    /**
     * The number of combinations in the input space when no rules are applied.
     */
    public span(): number {
        return this.parameters.reduce((total, p) => total * p.partitions.length, 1);
    }

    public [Symbol.iterator](): Iterator<Parameter> {
        return this.parameters[Symbol.iterator]();
    }

    public toString(): string {
        return `ParameterSet{${this.parameters.map(p => p.name).join(', ')}}`;
    }
}
