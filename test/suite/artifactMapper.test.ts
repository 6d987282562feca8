import * as assert from 'assert';
import { ArtifactMapper } from '../../src/analysis/artifactMapper';

describe('ArtifactMapper', () => {
    describe('deriveResourceDir', () => {
        it('should strip the extension of an aapt2 srcjar', () => {
            assert.strictEqual(ArtifactMapper.deriveResourceDir('x/aapt2.srcjar'), 'x/aapt2');
            assert.strictEqual(ArtifactMapper.deriveResourceDir('a/aapt2.srcjar'), 'a/aapt2');
        });

        it('should map android/R.srcjar to the aapt2/R directory', () => {
            assert.strictEqual(ArtifactMapper.deriveResourceDir('y/android/R.srcjar'), 'y/aapt2/R');
            assert.strictEqual(ArtifactMapper.deriveResourceDir('android/R.srcjar'), 'aapt2/R');
        });

        it('should ignore an R.srcjar outside an android directory', () => {
            assert.strictEqual(ArtifactMapper.deriveResourceDir('b/test/R.srcjar'), null);
            assert.strictEqual(ArtifactMapper.deriveResourceDir('b/myandroid/R.srcjar'), null);
        });

        it('should return null for other srcjars', () => {
            assert.strictEqual(ArtifactMapper.deriveResourceDir('z/proto.srcjar'), null);
            assert.strictEqual(ArtifactMapper.deriveResourceDir('c/aidl0.srcjar'), null);
        });

        it('should normalise backslashes', () => {
            assert.strictEqual(ArtifactMapper.deriveResourceDir('y\\android\\R.srcjar'), 'y/aapt2/R');
        });
    });

    describe('deriveJarPseudoPath', () => {
        it('should append the jar root marker', () => {
            assert.strictEqual(ArtifactMapper.deriveJarPseudoPath('a/b/aidl0.srcjar'), 'a/b/aidl0.srcjar!/');
        });

        it('should only map srcjars', () => {
            assert.strictEqual(ArtifactMapper.toSrcjarPseudoPath('R.java'), null);
            assert.strictEqual(ArtifactMapper.toSrcjarPseudoPath('a/b/aapt2.srcjar'), 'a/b/aapt2.srcjar!/');
        });
    });
});
