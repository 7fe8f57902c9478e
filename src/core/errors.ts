export type CommitErrorKind = 'repository' | 'generation' | 'abort';

/**
 * A failure while running or reading the output of a git command.
 */
export class RepositoryError extends Error {
	readonly kind = 'repository' satisfies CommitErrorKind;

	constructor(message: string, options?: {cause?: unknown}) {
		super(message, options);
		this.name = 'RepositoryError';
	}
}

/**
 * A failure to produce a commit message: nothing staged, or the text
 * service failed or answered with nothing.
 */
export class GenerationError extends Error {
	readonly kind = 'generation' satisfies CommitErrorKind;

	constructor(message: string, options?: {cause?: unknown}) {
		super(message, options);
		this.name = 'GenerationError';
	}
}

/** The user chose to quit. Not a failure. */
export class UserAbortError extends Error {
	readonly kind = 'abort' satisfies CommitErrorKind;

	constructor(message = 'Aborting.') {
		super(message);
		this.name = 'UserAbortError';
	}
}

export function errorDetail(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
