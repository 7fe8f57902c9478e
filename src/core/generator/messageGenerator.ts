import {GenerationError, errorDetail} from '../errors';
import {COMMIT_INSTRUCTIONS, buildPromptInput} from './prompt';
import type {MessageGenerator, TextGenerationService} from './types';

export type MessageGeneratorOptions = {
	service: TextGenerationService;
	model: string;
	onRequest?: (details: {model: string; inputLength: number}) => void;
};

export const NOTHING_STAGED_MESSAGE =
	'Nothing staged to commit. Stage changes with git add before generating a message.';

export function createMessageGenerator(
	options: MessageGeneratorOptions,
): MessageGenerator {
	const {service, model, onRequest} = options;

	return {
		async generate(diff, branch) {
			// An empty index never reaches the service.
			if (!diff) {
				throw new GenerationError(NOTHING_STAGED_MESSAGE);
			}

			const input = buildPromptInput(diff, branch);
			onRequest?.({model, inputLength: input.length});

			let text: string;
			try {
				text = await service.generateText({
					model,
					instructions: COMMIT_INSTRUCTIONS,
					input,
				});
			} catch (error) {
				throw new GenerationError(
					`Error generating commit message: ${errorDetail(error)}`,
					{cause: error},
				);
			}

			const message = text.trim();
			if (!message) {
				throw new GenerationError(
					'The AI service returned an empty commit message.',
				);
			}
			return message;
		},
	};
}
