import { Rule } from '../types';
import { Parameter } from './Parameter';
import { ParameterSet } from './ParameterSet';

/**
 * A rule that was found to examine a parameter other than the one it was declared on.
 */
export interface RuleAddition {
    rule: Rule;
    source: Parameter;
    target: Parameter;
}

export interface RulePropagatorOptions {
    onTrace?: (message: string) => void;
}

/**
 * Lists every rule against each parameter whose partitions it examines, on a new parameter set.
 * Compatibility already consults the owners of both partitions, so propagation never changes
 * whether a pair is compatible.
 *
 * A rule examines a parameter when calling it with some pair of partitions (source, target),
 * in either order, returns false. Parameters a rule never rejects are left untouched.
 */
export class RulePropagator {
    constructor(private readonly options: RulePropagatorOptions = {}) {}

    /**
     * Attaches each rule to the parameters it examines.
     *
     * @returns A new set over the same parameters whose rule lists, as reported by
     *  `dependenciesOf`, are supersets of the declared ones. The input is left unchanged.
     */
    public propagate(input: ParameterSet): ParameterSet {
        const additions = this.findMissingRules(input);
        this.trace(`RulePropagator: ${additions.length} rule(s) to propagate.`);

        const propagated = new Map<Parameter, Rule[]>();
        for (const parameter of input) {
            const extra = input.dependenciesOf(parameter).slice(parameter.dependencies.length);
            if (extra.length > 0) propagated.set(parameter, [...extra]);
        }
        for (const { rule, source, target } of additions) {
            const rules = propagated.get(target) ?? [];
            rules.push(rule);
            propagated.set(target, rules);
            this.trace(`RulePropagator: rule from '${source.name}' added to '${target.name}'.`);
        }

        return new ParameterSet(input.toArray(), propagated);
    }

    /**
     * Lists the rules missing from parameters they examine.
     */
    public findMissingRules(input: ParameterSet): RuleAddition[] {
        const additions: RuleAddition[] = [];
        for (const source of input) {
            for (const rule of source.dependencies) {
                for (const target of input) {
                    if (target === source || input.dependenciesOf(target).includes(rule)) continue;
                    if (additions.some(a => a.rule === rule && a.target === target)) continue;
                    if (this.examines(rule, source, target)) {
                        additions.push({ rule, source, target });
                    }
                }
            }
        }
        return additions;
    }

    private examines(rule: Rule, source: Parameter, target: Parameter): boolean {
        for (const sv of source.partitions) {
            for (const tv of target.partitions) {
                if (!rule(sv, tv) || !rule(tv, sv)) {
                    return true;
                }
            }
        }
        return false;
    }

    private trace(message: string): void {
        if (this.options.onTrace) this.options.onTrace(message);
    }
}
