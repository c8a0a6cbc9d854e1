import { ParameterSet } from '../src/engine/ParameterSet';
import { RulePropagator } from '../src/engine/RulePropagator';
import { excludes, nameIs, requires } from '../src/engine/Rules';
import { simpleParameter } from './fixtures';

describe('RulePropagator', () => {

    function browserOsDevice() {
        const safariOnMac = requires(nameIs('Safari'), 'OS', nameIs('macOS'));
        const browser = simpleParameter('Browser', ['Chrome', 'Safari'], [safariOnMac]);
        const os = simpleParameter('OS', ['Windows', 'macOS']);
        const device = simpleParameter('Device', ['Phone', 'Desktop']);
        return { safariOnMac, browser, os, device, input: new ParameterSet([browser, os, device]) };
    }

    it('should copy a rule to the parameter it examines', () => {
        const { safariOnMac, browser, os, device, input } = browserOsDevice();

        const output = new RulePropagator().propagate(input);

        expect(output.dependenciesOf(os)).toEqual([safariOnMac]);
        expect(output.dependenciesOf(browser)).toEqual([safariOnMac]);
        expect(output.dependenciesOf(device)).toEqual([]);
        expect(output.toArray()).toEqual([browser, os, device]);
        expect(output).not.toBe(input);
    });

    it('should leave the input set and its parameters unchanged', () => {
        const { safariOnMac, browser, os, device, input } = browserOsDevice();

        new RulePropagator().propagate(input);

        expect(input.dependenciesOf(os)).toEqual([]);
        expect(os.dependencies).toEqual([]);
        expect(browser.dependencies).toEqual([safariOnMac]);
        expect(device.dependencies).toEqual([]);
    });

    it('should report missing rules', () => {
        const { safariOnMac, browser, os, input } = browserOsDevice();

        const additions = new RulePropagator().findMissingRules(input);

        expect(additions).toEqual([{ rule: safariOnMac, source: browser, target: os }]);
    });

    it('should find nothing more to add on a second run', () => {
        const { safariOnMac, os, device, input } = browserOsDevice();
        const propagator = new RulePropagator();

        const once = propagator.propagate(input);
        expect(propagator.findMissingRules(once)).toEqual([]);

        const twice = propagator.propagate(once);
        expect(twice.dependenciesOf(os)).toEqual([safariOnMac]);
        expect(twice.dependenciesOf(device)).toEqual([]);
    });

    it('should add a rule examining several parameters to each of them', () => {
        const rule = excludes(nameIs('a1'), nameIs('b1'));
        const wide = excludes(nameIs('a2'), (p) => p.name === 'b2' || p.name === 'c2');
        const a = simpleParameter('A', ['a1', 'a2'], [rule, wide]);
        const b = simpleParameter('B', ['b1', 'b2']);
        const c = simpleParameter('C', ['c1', 'c2']);

        const output = new RulePropagator().propagate(new ParameterSet([a, b, c]));

        expect(output.dependenciesOf(b)).toEqual([rule, wide]);
        expect(output.dependenciesOf(c)).toEqual([wide]);
    });

    it('should keep the compatibility answer unchanged', () => {
        const { browser, os, input } = browserOsDevice();
        const safari = browser.getPartition('Safari');
        const windows = os.getPartition('Windows');
        if (!safari || !windows) throw new Error('fixture changed');

        const before = safari.isCompatibleWith(windows);
        new RulePropagator().propagate(input);

        expect(before).toBe(false);
        expect(safari.isCompatibleWith(windows)).toBe(false);
        expect(windows.isCompatibleWith(safari)).toBe(false);
    });

    it('should trace every addition', () => {
        const { input } = browserOsDevice();
        const messages: string[] = [];

        new RulePropagator({ onTrace: m => messages.push(m) }).propagate(input);

        expect(messages).toEqual([
            'RulePropagator: 1 rule(s) to propagate.',
            "RulePropagator: rule from 'Browser' added to 'OS'.",
        ]);
    });
});
