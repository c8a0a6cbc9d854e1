import { PartitionMatcher, Rule } from '../types';

/**
 * Matches partitions with the given name.
 */
export function nameIs(name: string): PartitionMatcher {
    return partition => partition.name === name;
}

export function nameStartsWith(prefix: string): PartitionMatcher {
    return partition => partition.name.startsWith(prefix);
}

export function nameIn(names: readonly string[]): PartitionMatcher {
    return partition => names.includes(partition.name);
}

/**
 * Matches partitions owned by the parameter with the given name.
 */
export function parameterIs(parameterName: string): PartitionMatcher {
    return partition => partition.parameter?.name === parameterName;
}

/**
 * Matches partitions that can produce the given value: the constant of a simple partition or
 * any value in the cycle of a cycling one. Computed partitions never match.
 */
export function valueIs(value: unknown): PartitionMatcher {
    return partition => partition.knownValues.some(v => Object.is(v, value));
}

export function valueIn(values: readonly unknown[]): PartitionMatcher {
    return partition => partition.knownValues.some(v => values.includes(v));
}

/**
 * Matches partitions with a known value whose string form contains the given text.
 */
export function valueContains(text: string): PartitionMatcher {
    return partition => partition.knownValues.some(v => String(v).includes(text));
}

export function allOf(...matchers: PartitionMatcher[]): PartitionMatcher {
    return partition => matchers.every(m => m(partition));
}

export function anyOf(...matchers: PartitionMatcher[]): PartitionMatcher {
    return partition => matchers.some(m => m(partition));
}

export function not(matcher: PartitionMatcher): PartitionMatcher {
    return partition => !matcher(partition);
}

/**
 * A rule that holds when each side matches its matcher. A missing matcher accepts anything.
 */
export function partitionsAre(left?: PartitionMatcher, right?: PartitionMatcher): Rule {
    return (first, second) => (left ? left(first) : true) && (right ? right(second) : true);
}

/**
 * When a partition matches `when`, any partition of the named parameter must match `then`.
 *
 * Example: requires(nameIs('Safari'), 'OS', nameIs('macOS'))
 */
export function requires(when: PartitionMatcher, parameterName: string, then: PartitionMatcher): Rule {
    return (first, second) => {
        if (!when(first) || second.parameter?.name !== parameterName) return true;
        return then(second);
    };
}

/**
 * Partitions matching `left` and `right` never appear together.
 */
export function excludes(left: PartitionMatcher, right: PartitionMatcher): Rule {
    return (first, second) => !(left(first) && right(second));
}
