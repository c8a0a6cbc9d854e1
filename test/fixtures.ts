import { Combination } from '../src/engine/Combination';
import { CombinationTable } from '../src/engine/CombinationTable';
import { Parameter } from '../src/engine/Parameter';
import { ParameterSet } from '../src/engine/ParameterSet';
import { SimplePartition } from '../src/engine/Partition';
import { excludes, nameIs, requires } from '../src/engine/Rules';

export function simpleParameter(name: string, values: string[], rules: Parameter['dependencies'] = []): Parameter {
    return new Parameter(name, values.map(v => SimplePartition.of(v)), rules);
}

/**
 * Browser x OS with "Safari only with macOS" declared on Browser.
 */
export function browserAndOs(): Parameter[] {
    return [
        simpleParameter('Browser', ['Chrome', 'Firefox', 'Safari'], [requires(nameIs('Safari'), 'OS', nameIs('macOS'))]),
        simpleParameter('OS', ['Windows', 'macOS', 'Linux']),
    ];
}

/**
 * Browser(3) x OS(3) x Resolution(2) with the Safari/macOS rule: 14 valid combinations.
 */
export function browserOsResolution(): Parameter[] {
    return [...browserAndOs(), simpleParameter('Resolution', ['1024x768', '1920x1080'])];
}

/**
 * Keys of every compatible pair of partitions that no combination of the table contains.
 */
export function uncoveredPairs(parameters: ParameterSet, table: CombinationTable): string[] {
    const covered = new Set<string>();
    for (const combination of table) {
        for (const pair of combination.pairs()) {
            covered.add(pair.key);
        }
    }

    const missing: string[] = [];
    for (let i = 0; i < parameters.size; i++) {
        for (let j = i + 1; j < parameters.size; j++) {
            for (const first of parameters.get(i).partitions) {
                for (const second of parameters.get(j).partitions) {
                    if (!first.isCompatibleWith(second)) continue;
                    const pair = new Combination(parameters);
                    pair.setValue(i, first);
                    pair.setValue(j, second);
                    if (!covered.has(pair.key)) missing.push(pair.key);
                }
            }
        }
    }
    return missing;
}

/**
 * Every full assignment accepted by all rules, by brute force.
 */
export function allValidCombinations(parameters: ParameterSet): Combination[] {
    let partial: Combination[] = [new Combination(parameters)];
    for (let i = 0; i < parameters.size; i++) {
        const next: Combination[] = [];
        for (const combination of partial) {
            for (const partition of parameters.get(i).partitions) {
                const extended = combination.copy();
                extended.setValue(i, partition);
                next.push(extended);
            }
        }
        partial = next;
    }
    return partial.filter(c => c.checkNoConflicts());
}

export function allValidKeys(parameters: ParameterSet): string[] {
    return allValidCombinations(parameters).map(c => c.key);
}

/**
 * Keys of the pairs that some valid full assignment contains but no combination of the table does.
 */
export function missedCoverablePairs(parameters: ParameterSet, table: CombinationTable): string[] {
    const covered = new Set<string>();
    for (const combination of table) {
        for (const pair of combination.pairs()) {
            covered.add(pair.key);
        }
    }
    const missed = new Set<string>();
    for (const combination of allValidCombinations(parameters)) {
        for (const pair of combination.pairs()) {
            if (!covered.has(pair.key)) missed.add(pair.key);
        }
    }
    return [...missed];
}

/**
 * Four parameters where a randomly chosen Q or R value can leave no room for a later slot:
 * q2 rules out r1 and r2 rules out d1, so p*|_|_|d1 needs q1 and r1.
 */
export function chainedExclusions(): Parameter[] {
    return [
        simpleParameter('P', ['p1', 'p2']),
        simpleParameter('Q', ['q1', 'q2'], [excludes(nameIs('q2'), nameIs('r1'))]),
        simpleParameter('R', ['r1', 'r2'], [excludes(nameIs('r2'), nameIs('d1'))]),
        simpleParameter('D', ['d1', 'd2']),
    ];
}
