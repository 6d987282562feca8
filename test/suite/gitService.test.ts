import * as assert from 'assert';
import * as path from 'path';
import { resolveRootPath } from '../../src/git/gitService';
import Logger from '../../src/utils/logger';
import { TEST_DATA_PATH } from './testConstants';

function fakeGit(root: string | null) {
    return { getRepoRoot: async () => root };
}

describe('resolveRootPath', () => {
    before(() => {
        Logger.setLevel('silent');
    });

    it('should prefer an explicit root', async () => {
        const root = await resolveRootPath(
            TEST_DATA_PATH,
            { ANDROID_BUILD_TOP: path.join(TEST_DATA_PATH, 'packages') },
            '/',
            fakeGit('/elsewhere'),
        );
        assert.strictEqual(root, TEST_DATA_PATH);
    });

    it('should resolve a relative root against cwd', async () => {
        const root = await resolveRootPath('test_data', {}, path.dirname(TEST_DATA_PATH), fakeGit(null));
        assert.strictEqual(root, TEST_DATA_PATH);
    });

    it('should fall back to the environment when the explicit root does not exist', async () => {
        const root = await resolveRootPath(
            path.join(TEST_DATA_PATH, 'missing'),
            { ANDROID_BUILD_TOP: TEST_DATA_PATH },
            '/',
            fakeGit('/elsewhere'),
        );
        assert.strictEqual(root, TEST_DATA_PATH);
    });

    it('should ask git last', async () => {
        const root = await resolveRootPath(undefined, {}, '/', fakeGit('/repo/top'));
        assert.strictEqual(root, '/repo/top');
    });

    it('should return null when nothing applies', async () => {
        const root = await resolveRootPath(undefined, { ANDROID_BUILD_TOP: '' }, '/', fakeGit(null));
        assert.strictEqual(root, null);
    });
});
