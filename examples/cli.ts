import { input } from '../src/engine/InputBuilder';
import { CyclingPartition, SimplePartition } from '../src/engine/Partition';
import { excludes, nameIs, requires } from '../src/engine/Rules';

const seed = 1234;

const table = input()
    .parameter('Browser', [
        CyclingPartition.of('Chrome', '116.0', ['116.0', '116.1', '116.2']),
        SimplePartition.of('Firefox'),
        SimplePartition.of('Safari'),
    ], [requires(nameIs('Safari'), 'OS', nameIs('macOS'))])
    .parameter('OS', [SimplePartition.of('Windows'), SimplePartition.of('macOS'), SimplePartition.of('Linux')])
    .parameter('Resolution', [
        SimplePartition.named('small', { width: 1024, height: 768 }),
        SimplePartition.named('large', { width: 1920, height: 1080 }),
    ], [excludes(nameIs('small'), nameIs('Linux'))])
    .generatePairwise({ seed });

console.log(`## Pairwise Combinations (Seed: ${seed})`);
console.log(`${table.size} combinations cover ${table.span()} value pairs.\n`);

table.asDataProvider().forEach(([description, ...values], index) => {
    console.log(`${String(index + 1).padStart(2)}. ${description}`);
    console.log(`    values: ${JSON.stringify(values)}`);
});
