import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { log } from 'apify';

import { errorMessage } from './errors.js';

const execFileAsync = promisify(execFile);
const LOG_PREFIX = '[publish]';

export interface Publisher {
    publish(checkedAt: string): Promise<void>;
}

export const noPublish: Publisher = {
    publish: async () => undefined,
};

export type GitRunner = (args: string[], cwd: string) => Promise<{ stdout: string; stderr: string }>;

const runGit: GitRunner = async (args, cwd) => {
    const { stdout, stderr } = await execFileAsync('git', args, { cwd, encoding: 'utf8' });
    return { stdout, stderr };
};

const isNothingToCommit = (error: unknown): boolean => {
    if (!(error instanceof Error)) return false;
    const stdout = 'stdout' in error ? String(error.stdout) : '';
    return `${error.message}\n${stdout}`.includes('nothing to commit');
};

/** Commits and pushes the generated reports so a static host can serve them. */
export class GitPublisher implements Publisher {
    constructor(
        private readonly repoPath: string,
        private readonly git: GitRunner = runGit,
    ) {}

    async publish(checkedAt: string): Promise<void> {
        log.info(`${LOG_PREFIX} Uploading reports from ${this.repoPath}`);
        const message = `Update property data - ${checkedAt.slice(0, 16).replace('T', ' ')}`;

        try {
            await this.git(['add', '.'], this.repoPath);
            await this.git(['commit', '-m', message], this.repoPath);
        } catch (error) {
            if (isNothingToCommit(error)) {
                log.info(`${LOG_PREFIX} No changes to upload`);
                return;
            }
            log.error(`${LOG_PREFIX} git commit failed`, { error: errorMessage(error) });
            return;
        }

        try {
            await this.git(['push'], this.repoPath);
            log.info(`${LOG_PREFIX} Uploaded`);
        } catch (error) {
            log.error(`${LOG_PREFIX} git push failed`, { error: errorMessage(error) });
        }
    }
}
