import { DataProviderRow } from '../types';
import { Combination } from './Combination';

/**
 * The ordered, deduplicated result of a generation run.
 *
 * Combinations are keyed by Combination.key and frozen when added.
 */
export class CombinationTable implements Iterable<Combination> {
    private readonly rows: Combination[] = [];
    private readonly keys = new Set<string>();

    constructor(combinations: Iterable<Combination> = []) {
        for (const combination of combinations) {
            this.add(combination);
        }
    }

    /**
     * Adds a combination unless one with the same key is already present.
     *
     * @returns true if the combination was added.
     */
    public add(combination: Combination): boolean {
        const key = combination.key;
        if (this.keys.has(key)) return false;
        this.keys.add(key);
        this.rows.push(combination.freeze());
        return true;
    }

    public has(key: string): boolean {
        return this.keys.has(key);
    }

    public get size(): number {
        return this.rows.length;
    }

    public get combinations(): readonly Combination[] {
        return this.rows;
    }

    public get(index: number): Combination | undefined {
        return this.rows[index];
    }

    public [Symbol.iterator](): Iterator<Combination> {
        return this.rows[Symbol.iterator]();
    }

    /**
     * Rows for external test runners: `[description, value_0, ..., value_n-1]`.
     * Values are read from the partitions at call time, so cycling partitions advance.
     */
    public asDataProvider(): DataProviderRow[] {
        return this.rows.map(c => c.asDataProviderRow());
    }

    /**
     * One record per combination mapping parameter names to values, plus `combination_description`.
     */
    public asRowMaps(): Record<string, unknown>[] {
        return this.rows.map(combination => {
            const row: Record<string, unknown> = {};
            combination.values.forEach((partition, i) => {
                if (partition !== null) {
                    row[combination.parameters.get(i).name] = partition.getValue();
                }
            });
            row.combination_description = combination.describe();
            return row;
        });
    }

    /**
     * Number of slots per combination, or -1 for an empty table.
     */
    public breadth(): number {
        return this.rows[0]?.size ?? -1;
    }

    /**
     * Number of distinct value pairs covered by the table, or -1 for an empty table.
     */
    public span(): number {
        if (this.rows.length === 0) return -1;
        const covered = new Set<string>();
        for (const combination of this.rows) {
            for (const pair of combination.pairs()) {
                covered.add(pair.key);
            }
        }
        return covered.size;
    }

    public toString(): string {
        const first = this.rows[0];
        return `CombinationTable{${this.rows.length} combinations.${first ? ` First is: ${first}` : ''}}`;
    }
}
