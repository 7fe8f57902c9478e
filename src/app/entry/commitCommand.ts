import {
	GenerationError,
	RepositoryError,
	UserAbortError,
	errorDetail,
} from '../../core/errors';
import type {MessageGenerator} from '../../core/generator/index';
import {runInteractionLoop, type Decision} from '../../core/loop/index';
import type {CommitExecutor, RepositoryInspector} from '../../infra/git/index';
import type {OutputWriter} from '../output';

export const COMMIT_EXIT_CODE = {
	SUCCESS: 0,
	FAILURE: 1,
} as const;

export type CommitExitCode =
	(typeof COMMIT_EXIT_CODE)[keyof typeof COMMIT_EXIT_CODE];

export type CommitCommandDeps = {
	inspector: RepositoryInspector;
	generator: MessageGenerator;
	committer: CommitExecutor;
	promptDecision: (message: string) => Promise<Decision>;
	output: OutputWriter;
};

function reportFailure(error: unknown, output: OutputWriter): CommitExitCode {
	if (error instanceof UserAbortError) {
		output.info(error.message);
		return COMMIT_EXIT_CODE.SUCCESS;
	}
	if (error instanceof RepositoryError) {
		output.error(`Git operation failed: ${error.message}`);
		return COMMIT_EXIT_CODE.FAILURE;
	}
	if (error instanceof GenerationError) {
		output.error(`AI operation failed: ${error.message}`);
		return COMMIT_EXIT_CODE.FAILURE;
	}
	output.error(`An unexpected error has occurred: ${errorDetail(error)}`);
	return COMMIT_EXIT_CODE.FAILURE;
}

function countLines(text: string): number {
	return text ? text.split('\n').length : 0;
}

export async function runCommitCommand(
	deps: CommitCommandDeps,
): Promise<CommitExitCode> {
	const {inspector, generator, committer, promptDecision, output} = deps;

	if (!inspector.isInsideWorkTree()) {
		output.error('Not in a git repository. Aborting.');
		return COMMIT_EXIT_CODE.FAILURE;
	}

	try {
		// Snapshot once; regenerations reuse these values.
		const diff = inspector.getStagedDiff();
		const branch = inspector.getBranchName();
		output.debug(
			`staged diff: ${countLines(diff)} lines on branch "${branch}"`,
		);

		const message = await runInteractionLoop({
			diff,
			branch,
			generator,
			promptDecision,
			onGenerate: attempt => {
				output.info('Generating commit message...');
				output.debug(`generation attempt ${attempt}`);
			},
		});

		committer.commit(message);
		output.success('Commit successful!');
		return COMMIT_EXIT_CODE.SUCCESS;
	} catch (error) {
		return reportFailure(error, output);
	}
}
