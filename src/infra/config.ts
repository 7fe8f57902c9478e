export const DEFAULT_MODEL = 'gpt-4o-mini';

export type CommitConfig = {
	model: string;
	/** OpenAI key from the environment; undefined lets the SDK report it missing. */
	apiKey?: string;
};

export function readConfig(
	env: Record<string, string | undefined> = process.env,
): CommitConfig {
	const apiKey = env['OPENAI_API_KEY']?.trim();
	return {
		model: DEFAULT_MODEL,
		apiKey: apiKey ? apiKey : undefined,
	};
}
