import { performance } from 'perf_hooks';
import { Parameter } from '../src/engine/Parameter';
import { SimplePartition } from '../src/engine/Partition';
import { excludes, nameIs } from '../src/engine/Rules';
import { generateLegacyPairwise, generatePairwise } from '../src/engine/TestGenerator';
import { CombinationTable } from '../src/engine/CombinationTable';
import { GenerationOptions } from '../src/types';

// Helper to generate a random input: every parameter excludes one value pair with the next one
function generateParameters(numParams: number, numValues: number): Parameter[] {
    const parameters: Parameter[] = [];
    for (let p = 0; p < numParams; p++) {
        const partitions = Array.from({ length: numValues }, (_, v) => SimplePartition.of(`P${p}V${v}`));
        const rules = p + 1 < numParams ? [excludes(nameIs(`P${p}V0`), nameIs(`P${p + 1}V0`))] : [];
        parameters.push(new Parameter(`P${p}`, partitions, rules));
    }
    return parameters;
}

interface TestCase {
    name: string;
    params: number;
    values: number;
    iters: number;
}

const MATRIX: TestCase[] = [
    { name: 'Small    (3x3)', params: 3, values: 3, iters: 20 },
    { name: 'Standard (4x4)', params: 4, values: 4, iters: 10 },
    { name: 'Wide     (8x3)', params: 8, values: 3, iters: 5 },
    { name: 'Tall     (3x8)', params: 3, values: 8, iters: 5 },
    { name: 'Large    (6x6)', params: 6, values: 6, iters: 2 },
];

type Strategy = (parameters: Parameter[], options: GenerationOptions) => CombinationTable;

const STRATEGIES: [string, Strategy][] = [
    ['Pairwise', generatePairwise],
    ['Legacy  ', generateLegacyPairwise],
];

console.log('--- Pairwise vs Legacy Benchmark ---');

for (const test of MATRIX) {
    for (const [label, strategy] of STRATEGIES) {
        process.stdout.write(`Running ${test.name} ${label} ... `);
        const parameters = generateParameters(test.params, test.values);
        const start = performance.now();
        let rows = 0;

        for (let i = 0; i < test.iters; i++) {
            const seed = Math.floor(Math.random() * 10000);
            const table = strategy(parameters, { seed, onWarning: () => undefined });
            rows += table.size;
        }

        const avg = (performance.now() - start) / test.iters;
        console.log(`${avg.toFixed(2)}ms / run (avg ${(rows / test.iters).toFixed(1)} combinations)`);
    }
}

console.log('------------------------------------');
