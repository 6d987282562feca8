import * as assert from 'assert';
import { ModuleInfoParser } from '../../src/analysis/moduleInfoParser';
import { SourceLocator } from '../../src/analysis/sourceLocator';
import { createBuildModule, type BuildModule } from '../../src/models/buildModule';
import type { ModuleGraphProvider } from '../../src/models/collaborators';
import Logger from '../../src/utils/logger';
import { AAPT2_SRCJAR, SRC_DIR, sortedArray, TEST_DATA_PATH, TEST_DIR } from './testConstants';

const LIB_JAR = 'out/target/common/obj/JAVA_LIBRARIES/lib_intermediates/classes.jar';
const FRAMEWORK_JAR = 'out/soong/.intermediates/frameworks/base/framework/android_common/framework.jar';
const R_SRCJAR = 'out/soong/.intermediates/packages/apps/test/android/R.srcjar';
const CLASSES_JAR = 'prebuilts/lib/classes/classes.jar';

class FixedProvider implements ModuleGraphProvider {
    constructor(private modules: BuildModule[]) {}

    async loadModules(): Promise<Map<string, BuildModule>> {
        return new Map(this.modules.map((m) => [m.name, m]));
    }
}

describe('SourceLocator', () => {
    let locator: SourceLocator;

    before(() => {
        Logger.setLevel('silent');
    });

    beforeEach(() => {
        locator = new SourceLocator(TEST_DATA_PATH, new ModuleInfoParser(TEST_DATA_PATH, 'module-info.json'));
    });

    it('should resolve dependencies beyond the depth as jars', async () => {
        const result = await locator.locate(['test'], { mode: 'combined-project', requestedDepth: 0 });

        assert.deepStrictEqual(result.modules.map((m) => [m.name, m.representation]), [
            ['test', 'source'],
            ['lib', 'jar'],
            ['framework', 'jar'],
            ['prebuilt', 'jar'],
        ]);
        const { aggregate } = result;
        assert.deepStrictEqual(sortedArray(aggregate.srcDirs), [SRC_DIR]);
        assert.deepStrictEqual(sortedArray(aggregate.testDirs), [TEST_DIR]);
        assert.deepStrictEqual(sortedArray(aggregate.jarFiles), []);
        assert.deepStrictEqual(sortedArray(aggregate.missingJars), [FRAMEWORK_JAR, LIB_JAR]);
        assert.deepStrictEqual(sortedArray(aggregate.rJavaPaths), [
            'out/soong/.intermediates/packages/apps/test_aapt2/aapt2',
        ]);
        assert.deepStrictEqual(sortedArray(aggregate.srcjarPaths), [
            `${R_SRCJAR}!/`,
            `${AAPT2_SRCJAR}!/`,
            `${TEST_DIR}/test.srcjar!/`,
        ].sort());
        assert.deepStrictEqual(sortedArray(aggregate.buildTargets), [FRAMEWORK_JAR, R_SRCJAR, LIB_JAR]);
    });

    it('should keep every module within the depth as source', async () => {
        const result = await locator.locate(['test'], { mode: 'combined-project', requestedDepth: 2 });
        assert.ok(result.modules.every((m) => m.representation === 'source'));
        assert.deepStrictEqual(sortedArray(result.aggregate.srcDirs), ['frameworks/lib/src', SRC_DIR]);
        assert.deepStrictEqual(sortedArray(result.aggregate.jarFiles), []);
        assert.deepStrictEqual(sortedArray(result.aggregate.buildTargets), [R_SRCJAR]);
    });

    it('should attach every non-project module as a jar', async () => {
        const result = await locator.locate(['test'], { mode: 'per-module-project', requestedDepth: 0 });
        const { aggregate } = result;
        assert.deepStrictEqual(sortedArray(aggregate.srcDirs), [SRC_DIR]);
        assert.deepStrictEqual(sortedArray(aggregate.jarFiles), [CLASSES_JAR]);
        assert.deepStrictEqual(sortedArray(aggregate.buildTargets), [FRAMEWORK_JAR, R_SRCJAR, LIB_JAR]);
    });

    it('should not schedule the missing jars of a project', async () => {
        const provider = new FixedProvider([
            createBuildModule('app', { installed: ['out/app.jar'], dependencies: ['dep'] }),
            createBuildModule('dep', { installed: ['out/dep.jar'] }),
        ]);
        const result = await new SourceLocator(TEST_DATA_PATH, provider)
            .locate(['app'], { mode: 'per-module-project', requestedDepth: 0 });
        assert.deepStrictEqual(sortedArray(result.aggregate.buildTargets), ['out/dep.jar']);
        assert.deepStrictEqual(sortedArray(result.aggregate.missingJars), ['out/dep.jar']);
    });

    it('should keep a depth supplied by the provider', async () => {
        const provider = new FixedProvider([
            createBuildModule('app', { dependencies: ['dep'] }),
            createBuildModule('dep', { depth: 0, installed: ['out/dep.jar'] }),
        ]);
        const result = await new SourceLocator(TEST_DATA_PATH, provider)
            .locate(['app'], { mode: 'combined-project', requestedDepth: 0 });
        assert.deepStrictEqual(result.modules.map((m) => m.representation), ['source', 'source']);
        assert.deepStrictEqual(sortedArray(result.aggregate.buildTargets), []);
    });

    it('should give the same result for any concurrency', async () => {
        const serial = await locator.locate(['test'], { mode: 'combined-project', requestedDepth: 1, concurrency: 1 });
        const parallel = await locator.locate(['test'], { mode: 'combined-project', requestedDepth: 1, concurrency: 8 });
        assert.deepStrictEqual(serial.aggregate, parallel.aggregate);
        assert.deepStrictEqual(serial.modules, parallel.modules);
    });

    it('should report progress', async () => {
        const messages: string[] = [];
        await locator.locate(['test'], { mode: 'combined-project', requestedDepth: 0 }, (m) => messages.push(m));
        assert.strictEqual(messages[0], '4 module(s) reachable from test.');
        assert.ok(messages[messages.length - 1].startsWith('Done: 1 source root(s), 1 test root(s)'));
    });

    it('should return nothing for an unknown target', async () => {
        const result = await locator.locate(['ghost'], { mode: 'combined-project', requestedDepth: 0 });
        assert.deepStrictEqual(result.modules, []);
        assert.strictEqual(result.aggregate.srcDirs.size, 0);
    });
});
