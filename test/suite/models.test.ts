import * as assert from 'assert';
import { emptyResolvedSets, mergeResolvedSets, ModuleDataBuilder } from '../../src/models/moduleData';
import { sortedArray } from './testConstants';

describe('ModuleData', () => {
    describe('ModuleDataBuilder', () => {
        it('should never keep a test dir as a source dir', () => {
            const builder = new ModuleDataBuilder('m');
            builder.addSourceDir('a', false);
            builder.addSourceDir('a', true);
            builder.addSourceDir('a', false);
            builder.addSourceDir('b', false);
            const data = builder.build();
            assert.deepStrictEqual(sortedArray(data.srcDirs), ['b']);
            assert.deepStrictEqual(sortedArray(data.testDirs), ['a']);
        });

        it('should tag issues with the module name', () => {
            const builder = new ModuleDataBuilder('m');
            builder.addIssue('file-not-found', 'x/Y.java');
            assert.deepStrictEqual(builder.build().issues, [
                { kind: 'file-not-found', module: 'm', path: 'x/Y.java' },
            ]);
        });

        it('should hand out snapshots unaffected by later changes', () => {
            const builder = new ModuleDataBuilder('m', 'jar');
            builder.jarFiles.add('one.jar');
            const data = builder.build();
            builder.jarFiles.add('two.jar');
            assert.strictEqual(data.representation, 'jar');
            assert.deepStrictEqual(sortedArray(data.jarFiles), ['one.jar']);
            assert.ok(Object.isFrozen(data));
        });
    });

    describe('mergeResolvedSets', () => {
        it('should return empty sets for no input', () => {
            assert.deepStrictEqual(mergeResolvedSets([]), emptyResolvedSets());
        });

        it('should drop dirs that any module classifies as test', () => {
            const first = new ModuleDataBuilder('a');
            first.addSourceDir('shared', false);
            first.addSourceDir('own', false);
            first.jarFiles.add('a.jar');
            const second = new ModuleDataBuilder('b');
            second.addSourceDir('shared', true);
            second.jarFiles.add('a.jar');
            second.buildTargets.add('b.srcjar');

            const forward = mergeResolvedSets([first.build(), second.build()]);
            const backward = mergeResolvedSets([second.build(), first.build()]);

            assert.deepStrictEqual(sortedArray(forward.srcDirs), ['own']);
            assert.deepStrictEqual(sortedArray(forward.testDirs), ['shared']);
            assert.deepStrictEqual(sortedArray(forward.jarFiles), ['a.jar']);
            assert.deepStrictEqual(sortedArray(forward.buildTargets), ['b.srcjar']);
            assert.deepStrictEqual(forward, backward);
        });
    });
});
