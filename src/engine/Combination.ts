import { DataProviderRow } from '../types';
import { ConfigurationError, PairwiseError } from '../errors';
import { ValuePartition } from './Partition';
import { ParameterSet } from './ParameterSet';

const SEPARATOR = '|';
const EMPTY = '_';

function escapeKeyPart(name: string): string {
    if (name === EMPTY) return `\\${EMPTY}`;
    return name.replace(/[\\|]/g, match => `\\${match}`);
}

/**
 * One full or partial test case: a slot per parameter, each holding a partition of that
 * parameter or null while unassigned.
 *
 * Combinations are mutated by the algorithm that builds them and frozen once they are
 * added to a CombinationTable.
 */
export class Combination {
    private readonly slots: (ValuePartition | null)[];
    private frozen = false;

    /**
     * Creates an empty combination over the given parameters.
     */
    constructor(public readonly parameters: ParameterSet) {
        if (!(parameters instanceof ParameterSet)) {
            throw new ConfigurationError('A combination requires a parameter set.');
        }
        this.slots = new Array<ValuePartition | null>(parameters.size).fill(null);
    }

    public get size(): number {
        return this.slots.length;
    }

    public get values(): readonly (ValuePartition | null)[] {
        return this.slots;
    }

    public get isFrozen(): boolean {
        return this.frozen;
    }

    public getValue(index: number): ValuePartition | null {
        this.checkIndex(index);
        return this.slots[index];
    }

    /**
     * Assigns a partition to a slot.
     *
     * @throws {ConfigurationError} If the index is out of range, the partition is missing,
     *  or it does not belong to the parameter at that index.
     * @throws {PairwiseError} If the combination is frozen.
     */
    public setValue(index: number, partition: ValuePartition): void {
        this.checkIndex(index);
        this.checkMutable();
        if (partition === null || partition === undefined) {
            throw new ConfigurationError(`Cannot assign an empty value to slot ${index}; use clearValue instead.`);
        }
        const parameter = this.parameters.get(index);
        if (partition.parameter !== parameter) {
            throw new ConfigurationError(`Partition '${partition.name}' does not belong to parameter '${parameter.name}' at slot ${index}.`);
        }
        this.slots[index] = partition;
    }

    /**
     * Unassigns a slot.
     */
    public clearValue(index: number): void {
        this.checkIndex(index);
        this.checkMutable();
        this.slots[index] = null;
    }

    /**
     * The canonical key of this combination, e.g. "Chrome|_|1024x768".
     * Partition names are escaped so that different assignments never share a key.
     */
    public get key(): string {
        return this.slots.map(p => (p === null ? EMPTY : escapeKeyPart(p.name))).join(SEPARATOR);
    }

    public isFilled(): boolean {
        return this.slots.every(p => p !== null);
    }

    /**
     * Number of assigned slots.
     */
    public get setCount(): number {
        return this.slots.filter(p => p !== null).length;
    }

    /**
     * Checks whether a partition could be placed at a slot without conflicting with the
     * other assigned slots. The current content of that slot is ignored.
     */
    public fits(index: number, partition: ValuePartition): boolean {
        this.checkIndex(index);
        for (let i = 0; i < this.slots.length; i++) {
            if (i === index) continue;
            const other = this.slots[i];
            if (other !== null && !partition.isCompatibleWith(other)) {
                return false;
            }
        }
        return true;
    }

    /**
     * Checks that every pair of assigned slots is mutually compatible.
     */
    public checkNoConflicts(): boolean {
        for (let i = 0; i < this.slots.length; i++) {
            const first = this.slots[i];
            if (first === null) continue;
            for (let j = i + 1; j < this.slots.length; j++) {
                const second = this.slots[j];
                if (second !== null && !first.isCompatibleWith(second)) {
                    return false;
                }
            }
        }
        return true;
    }

    /**
     * Merges the assigned slots of another combination into a copy of this one.
     * Compatibility of the merged result is not checked here.
     *
     * @returns The merged combination, or null if both assign different partitions to a slot.
     */
    public merge(other: Combination): Combination | null {
        if (other.parameters !== this.parameters) {
            throw new ConfigurationError('Cannot merge combinations built over different parameter sets.');
        }
        const result = this.copy();
        for (let i = 0; i < this.slots.length; i++) {
            const mine = this.slots[i];
            const theirs = other.slots[i];
            if (theirs === null) continue;
            if (mine !== null && mine !== theirs) return null;
            result.slots[i] = theirs;
        }
        return result;
    }

    /**
     * All two-slot sub-combinations of the assigned slots.
     */
    public pairs(): Combination[] {
        const result: Combination[] = [];
        for (let i = 0; i < this.slots.length; i++) {
            const first = this.slots[i];
            if (first === null) continue;
            for (let j = i + 1; j < this.slots.length; j++) {
                const second = this.slots[j];
                if (second === null) continue;
                const pair = new Combination(this.parameters);
                pair.slots[i] = first;
                pair.slots[j] = second;
                result.push(pair);
            }
        }
        return result;
    }

    /**
     * Creates an unfrozen copy with the same assignments.
     */
    public copy(): Combination {
        const result = new Combination(this.parameters);
        for (let i = 0; i < this.slots.length; i++) {
            result.slots[i] = this.slots[i];
        }
        return result;
    }

    /**
     * Makes this combination read-only.
     */
    public freeze(): this {
        this.frozen = true;
        return this;
    }

    public equals(other: Combination): boolean {
        return other.parameters === this.parameters && other.slots.every((p, i) => p === this.slots[i]);
    }

    /**
     * Human-readable rendering of the assignments, e.g. "Browser=Chrome, OS=_".
     */
    public describe(): string {
        return this.slots
            .map((p, i) => `${this.parameters.get(i).name}=${p === null ? EMPTY : p.name}`)
            .join(', ');
    }

    /**
     * Converts this combination into a row for an external test runner: the description
     * followed by one value read from each partition.
     *
     * @throws {PairwiseError} If a slot is unassigned.
     */
    public asDataProviderRow(): DataProviderRow {
        const values = this.slots.map((p, i) => {
            if (p === null) {
                throw new PairwiseError(`Cannot export combination ${this.key}: slot ${i} is unassigned.`);
            }
            return p.getValue();
        });
        return [this.describe(), ...values];
    }

    public toString(): string {
        const parts = this.slots.map(p => (p === null ? 'null' : p.toString()));
        return `Combination{[${parts.join(', ')}]}`;
    }

    private checkIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
            throw new ConfigurationError(`Index ${index} out of bounds for length ${this.slots.length}.`);
        }
    }

    private checkMutable(): void {
        if (this.frozen) {
            throw new PairwiseError(`Combination ${this.key} is frozen and cannot be modified.`);
        }
    }
}
