import { Parameter } from '../src/engine/Parameter';
import { ParameterSet } from '../src/engine/ParameterSet';
import { SimplePartition } from '../src/engine/Partition';
import { excludes, nameIs } from '../src/engine/Rules';
import { ConfigurationError } from '../src/errors';
import { simpleParameter } from './fixtures';

describe('Parameter', () => {

    it('should keep partitions in declaration order', () => {
        const os = simpleParameter('OS', ['Windows', 'macOS', 'Linux']);
        expect(os.partitions.map(p => p.name)).toEqual(['Windows', 'macOS', 'Linux']);
        expect(os.getPartition('macOS')?.name).toBe('macOS');
        expect(os.getPartition('BeOS')).toBeUndefined();
    });

    it('should accept an empty partition list', () => {
        const empty = new Parameter('Empty', []);
        expect(empty.partitions).toHaveLength(0);
    });

    it('should reject an empty name', () => {
        expect(() => Parameter.of('', SimplePartition.of('x'))).toThrow(ConfigurationError);
    });

    it('should reject duplicate partition names', () => {
        expect(() => Parameter.of('OS', SimplePartition.of('Linux'), SimplePartition.of('Linux')))
            .toThrow("Parameter 'OS' has duplicate partition 'Linux'.");
    });

    it('should not attach any partition when validation fails', () => {
        const linux = SimplePartition.of('Linux');
        expect(() => Parameter.of('OS', linux, SimplePartition.of('Linux'))).toThrow(ConfigurationError);
        expect(linux.parameter).toBeUndefined();
    });

    it('should not share its rule list with the caller', () => {
        const rule = excludes(nameIs('a'), nameIs('b'));
        const rules = [rule];
        const parameter = simpleParameter('A', ['a'], rules);
        rules.push(excludes(nameIs('a'), nameIs('c')));

        expect(parameter.hasRule(rule)).toBe(true);
        expect(parameter.dependencies).toEqual([rule]);
    });

    it('should evaluate each rule in both argument orders', () => {
        const a = SimplePartition.of('a');
        const b = SimplePartition.of('b');
        const parameter = new Parameter('A', [a], [excludes(nameIs('b'), nameIs('a'))]);

        expect(parameter.areCompatible(a, b)).toBe(false);
        expect(parameter.areCompatible(b, a)).toBe(false);
    });
});

describe('ParameterSet', () => {

    it('should reject an empty list', () => {
        expect(() => new ParameterSet([])).toThrow('At least one parameter is required.');
    });

    it('should reject duplicate parameter names', () => {
        expect(() => new ParameterSet([simpleParameter('OS', ['Linux']), simpleParameter('OS', ['Windows'])]))
            .toThrow('Duplicate parameter name found: OS');
    });

    it('should compute the span as the product of partition counts', () => {
        const parameters = new ParameterSet([
            simpleParameter('Browser', ['Chrome', 'Firefox', 'Safari']),
            simpleParameter('OS', ['Windows', 'macOS', 'Linux']),
            simpleParameter('Resolution', ['1024x768', '1920x1080']),
        ]);
        expect(parameters.span()).toBe(18);
    });

    it('should look parameters up by name and index', () => {
        const os = simpleParameter('OS', ['Linux']);
        const parameters = new ParameterSet([simpleParameter('Browser', ['Chrome']), os]);

        expect(parameters.find('OS')).toBe(os);
        expect(parameters.indexOf(os)).toBe(1);
        expect(parameters.get(1)).toBe(os);
        expect(() => parameters.get(2)).toThrow(ConfigurationError);
        expect([...parameters].map(p => p.name)).toEqual(['Browser', 'OS']);
        expect(parameters.toString()).toBe('ParameterSet{Browser, OS}');
    });

    it('should return an existing set unchanged from from()', () => {
        const parameters = new ParameterSet([simpleParameter('OS', ['Linux'])]);
        expect(ParameterSet.from(parameters)).toBe(parameters);
    });

    it('should report declared rules followed by propagated ones', () => {
        const declared = excludes(nameIs('Linux'), nameIs('Safari'));
        const propagated = excludes(nameIs('Safari'), nameIs('Linux'));
        const os = simpleParameter('OS', ['Linux'], [declared]);
        const browser = simpleParameter('Browser', ['Safari']);
        const parameters = new ParameterSet([os, browser], new Map([[os, [propagated]]]));

        expect(parameters.dependenciesOf(os)).toEqual([declared, propagated]);
        expect(parameters.dependenciesOf(browser)).toEqual([]);
        expect(os.dependencies).toEqual([declared]);
    });

    it('should reject rules propagated to a parameter outside the set', () => {
        const os = simpleParameter('OS', ['Linux']);
        const stranger = simpleParameter('Device', ['Phone']);
        expect(() => new ParameterSet([os], new Map([[stranger, [excludes(nameIs('x'), nameIs('y'))]]])))
            .toThrow("Rules were propagated to 'Device', which is not in the set.");
    });
});
