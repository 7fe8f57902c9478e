import {RepositoryError, errorDetail} from '../../core/errors';
import {GitCommandError, type GitRunner} from './runGit';

export type RepositoryInspector = {
	isInsideWorkTree: () => boolean;
	getBranchName: () => string;
	getStagedDiff: () => string;
};

export function toRepositoryError(
	action: string,
	error: unknown,
): RepositoryError {
	const detail =
		error instanceof GitCommandError ? error.detail : errorDetail(error);
	return new RepositoryError(`Error ${action}: ${detail}`, {cause: error});
}

export function createRepositoryInspector(git: GitRunner): RepositoryInspector {
	return {
		isInsideWorkTree() {
			try {
				return git(['rev-parse', '--is-inside-work-tree']).trim() === 'true';
			} catch {
				return false;
			}
		},

		getBranchName() {
			try {
				return git(['branch', '--show-current']).trim();
			} catch (error) {
				throw toRepositoryError('getting git branch', error);
			}
		},

		getStagedDiff() {
			try {
				return git(['diff', '--cached']).trim();
			} catch (error) {
				throw toRepositoryError('getting git diff', error);
			}
		},
	};
}
