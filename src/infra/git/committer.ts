import {toRepositoryError} from './inspector';
import type {GitRunner} from './runGit';

export type CommitExecutor = {
	commit: (message: string) => void;
};

export function createCommitExecutor(git: GitRunner): CommitExecutor {
	return {
		commit(message) {
			try {
				// The message is a single argv entry; no shell sees it.
				git(['commit', '-m', message]);
			} catch (error) {
				throw toRepositoryError('during git commit', error);
			}
		},
	};
}
