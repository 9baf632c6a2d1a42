import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { type GitRunner, GitPublisher } from '../publish.js';

const CHECKED_AT = '2024-03-02T08:00:00.000Z';

const gitFailure = (message: string, stdout = ''): Error => Object.assign(new Error(message), { stdout });

describe('GitPublisher', () => {
    beforeEach(() => {
        vi.spyOn(log, 'info').mockReturnValue(undefined);
        vi.spyOn(log, 'error').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should add, commit and push in the repository', async () => {
        const git = vi.fn<GitRunner>(async () => ({ stdout: '', stderr: '' }));

        await new GitPublisher('/srv/site', git).publish(CHECKED_AT);

        expect(git.mock.calls).toEqual([
            [['add', '.'], '/srv/site'],
            [['commit', '-m', 'Update property data - 2024-03-02 08:00'], '/srv/site'],
            [['push'], '/srv/site'],
        ]);
    });

    it('should stop quietly when there is nothing to commit', async () => {
        const git = vi.fn<GitRunner>(async (args) => {
            if (args[0] === 'commit') {
                throw gitFailure('Command failed: git commit', 'nothing to commit, working tree clean');
            }
            return { stdout: '', stderr: '' };
        });

        await new GitPublisher('/srv/site', git).publish(CHECKED_AT);

        expect(git).toHaveBeenCalledTimes(2);
        expect(log.info).toHaveBeenCalledWith('[publish] No changes to upload');
        expect(log.error).not.toHaveBeenCalled();
    });

    it('should log a failed push without throwing', async () => {
        const git = vi.fn<GitRunner>(async (args) => {
            if (args[0] === 'push') throw gitFailure('rejected');
            return { stdout: '', stderr: '' };
        });

        await expect(new GitPublisher('/srv/site', git).publish(CHECKED_AT)).resolves.toBeUndefined();
        expect(log.error).toHaveBeenCalledWith('[publish] git push failed', { error: 'rejected' });
    });
});
