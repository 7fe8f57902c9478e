export type TextGenerationRequest = {
	model: string;
	instructions: string;
	input: string;
};

/** Anything that turns an instruction plus input into text. */
export type TextGenerationService = {
	generateText: (request: TextGenerationRequest) => Promise<string>;
};

export type MessageGenerator = {
	generate: (diff: string, branch: string) => Promise<string>;
};
