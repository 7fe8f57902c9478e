import {execFileSync} from 'node:child_process';

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Runs one git command and returns its stdout. Throws on non-zero exit. */
export type GitRunner = (args: readonly string[]) => string;

export type RunGitOptions = {
	cwd?: string;
};

export class GitCommandError extends Error {
	readonly args: readonly string[];
	readonly status: number | null;
	readonly detail: string;

	constructor(
		args: readonly string[],
		status: number | null,
		detail: string,
		options?: {cause?: unknown},
	) {
		super(`git ${args.join(' ')} failed: ${detail}`, options);
		this.name = 'GitCommandError';
		this.args = args;
		this.status = status;
		this.detail = detail;
	}
}

function readField(error: unknown, field: string): unknown {
	if (typeof error !== 'object' || error === null) {
		return undefined;
	}
	return Reflect.get(error, field);
}

function describeFailure(error: unknown): string {
	const stderr = readField(error, 'stderr');
	const text =
		typeof stderr === 'string'
			? stderr
			: Buffer.isBuffer(stderr)
				? stderr.toString('utf-8')
				: '';
	if (text.trim()) {
		return text.trim();
	}
	return error instanceof Error ? error.message : String(error);
}

export function runGit(
	args: readonly string[],
	options: RunGitOptions = {},
): string {
	try {
		return execFileSync('git', [...args], {
			cwd: options.cwd,
			encoding: 'utf-8',
			maxBuffer: MAX_OUTPUT_BYTES,
			stdio: ['ignore', 'pipe', 'pipe'],
		});
	} catch (error) {
		const status = readField(error, 'status');
		throw new GitCommandError(
			args,
			typeof status === 'number' ? status : null,
			describeFailure(error),
			{cause: error},
		);
	}
}

export function createGitRunner(options: RunGitOptions = {}): GitRunner {
	return args => runGit(args, options);
}
