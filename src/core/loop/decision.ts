export const DECISIONS = ['accept', 'regenerate', 'quit'] as const;

export type Decision = (typeof DECISIONS)[number];

const DECISION_KEYS: Record<string, Decision> = {
	Y: 'accept',
	R: 'regenerate',
	Q: 'quit',
};

/** Maps one line of input to a decision, or null when it is not Y, R or Q. */
export function parseDecision(input: string): Decision | null {
	return DECISION_KEYS[input.trim().toUpperCase()] ?? null;
}
