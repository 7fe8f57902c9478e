export const BANNER_TITLE = 'Generated commit message:';
export const MESSAGE_RULE = '='.repeat(41);
export const ACCEPT_QUESTION = 'Are you sure you want to accept this?';
export const DECISION_LABEL = 'Yes (Y) Remake (R) Quit (Q)';
export const INVALID_INPUT_TEXT = 'Invalid input. Please enter Y, R, or Q.';

/** The banner as plain lines, for output that is not drawn by ink. */
export function bannerLines(message: string): string[] {
	return [
		'',
		BANNER_TITLE,
		MESSAGE_RULE,
		message,
		MESSAGE_RULE,
		'',
		ACCEPT_QUESTION,
	];
}
