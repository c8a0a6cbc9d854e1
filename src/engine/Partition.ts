import { ValueSupplier } from '../types';
import { ConfigurationError } from '../errors';
import type { Parameter } from './Parameter';

/**
 * A named equivalence class of a parameter that produces a concrete value on every read.
 *
 * A partition belongs to at most one parameter. The back-reference is set once when the
 * parameter is constructed and never changes afterwards. Combination bookkeeping works on
 * the partition instance and its name, never on the produced value.
 */
export abstract class ValuePartition<T = unknown> {
    public readonly name: string;
    private owner: Parameter | undefined;

    protected constructor(name: string) {
        if (typeof name !== 'string' || name.length === 0) {
            throw new ConfigurationError('Partition name must be a non-empty string.');
        }
        this.name = name;
    }

    /**
     * The parameter this partition belongs to, or undefined while unattached.
     */
    public get parameter(): Parameter | undefined {
        return this.owner;
    }

    /**
     * Binds this partition to its owning parameter.
     *
     * @throws {ConfigurationError} If the partition already belongs to a different parameter.
     */
    public attachTo(parameter: Parameter): void {
        if (this.owner !== undefined && this.owner !== parameter) {
            throw new ConfigurationError(`Partition '${this.name}' already belongs to parameter '${this.owner.name}'.`);
        }
        this.owner = parameter;
    }

    /**
     * Reads the value represented by this partition.
     */
    public abstract getValue(): T;

    /**
     * Values this partition is known to produce. Never advances a cycle or calls a supplier.
     */
    public abstract get knownValues(): readonly T[];

    /**
     * Checks whether this partition may appear in the same combination as another one.
     *
     * An unattached partition is compatible with everything. Otherwise both owning parameters
     * must accept the pair, which keeps the check symmetric.
     */
    public isCompatibleWith(other: ValuePartition): boolean {
        const mine = this.owner;
        const theirs = other.parameter;
        if (mine === undefined || theirs === undefined) return true;
        return mine.areCompatible(this, other) && theirs.areCompatible(other, this);
    }

    public toString(): string {
        return `${this.owner?.name ?? ''}:${this.name}`;
    }
}

/**
 * A partition that always returns the same value.
 * Example: SimplePartition.of('Chrome')
 */
export class SimplePartition<T = unknown> extends ValuePartition<T> {
    constructor(name: string, private readonly value: T) {
        super(name);
    }

    /**
     * Creates a constant partition named after its value.
     */
    public static of<V>(value: V): SimplePartition<V> {
        return new SimplePartition(String(value), value);
    }

    /**
     * Creates a constant partition with an explicit name.
     */
    public static named<V>(name: string, value: V): SimplePartition<V> {
        return new SimplePartition(name, value);
    }

    public getValue(): T {
        return this.value;
    }

    public get knownValues(): readonly T[] {
        return [this.value];
    }
}

/**
 * A partition whose value is computed by a supplier on every read.
 * Nothing is cached: side effects and non-determinism of the supplier are the caller's concern.
 */
export class ComputedPartition<T = unknown> extends ValuePartition<T> {
    constructor(name: string, private readonly supplier: ValueSupplier<T>) {
        super(name);
        if (typeof supplier !== 'function') {
            throw new ConfigurationError(`Partition '${name}' requires a value supplier.`);
        }
    }

    public static of<V>(name: string, supplier: ValueSupplier<V>): ComputedPartition<V> {
        return new ComputedPartition(name, supplier);
    }

    public getValue(): T {
        return this.supplier();
    }

    /**
     * Always empty: the supplier is only called when the value is read.
     */
    public get knownValues(): readonly T[] {
        return [];
    }
}

/**
 * A partition that cycles through several equivalent values.
 *
 * Reads start with the default value and walk the list in order, wrapping around forever.
 * If the default is not part of the list it is placed in front of it.
 *
 * Example: CyclingPartition.of('Chrome', '116.0', ['116.0', '116.1', '116.2'])
 * reads 116.0, 116.1, 116.2, 116.0, ...
 */
export class CyclingPartition<T = unknown> extends ValuePartition<T> {
    private readonly values: readonly T[];
    private cursor = 0;

    constructor(name: string, public readonly defaultValue: T, values: readonly T[]) {
        super(name);
        if (!Array.isArray(values)) {
            throw new ConfigurationError(`Partition '${name}' requires a list of values.`);
        }
        this.values = values.includes(defaultValue) ? [...values] : [defaultValue, ...values];
    }

    public static of<V>(name: string, defaultValue: V, values: readonly V[]): CyclingPartition<V> {
        return new CyclingPartition(name, defaultValue, values);
    }

    /**
     * Creates a cycling partition whose default is the first of the given values.
     */
    public static from<V>(name: string, values: readonly V[]): CyclingPartition<V> {
        if (!Array.isArray(values) || values.length === 0) {
            throw new ConfigurationError(`Partition '${name}' requires at least one value.`);
        }
        return new CyclingPartition(name, values[0], values);
    }

    /**
     * All values in cycle order.
     */
    public get cycle(): readonly T[] {
        return this.values;
    }

    public get knownValues(): readonly T[] {
        return this.values;
    }

    public getValue(): T {
        // fetch-and-increment with wrap
        const index = this.cursor;
        this.cursor = (index + 1) % this.values.length;
        return this.values[index];
    }
}
