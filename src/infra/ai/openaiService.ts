import OpenAI from 'openai';
import type {
	TextGenerationRequest,
	TextGenerationService,
} from '../../core/generator/types';

export type OpenAITextServiceOptions = {
	apiKey?: string;
};

/**
 * Text generation over the OpenAI Responses API.
 *
 * The client is built on the first request, so a missing or invalid key
 * shows up as a failed generation rather than a startup crash.
 */
export function createOpenAITextService(
	options: OpenAITextServiceOptions = {},
): TextGenerationService {
	let client: OpenAI | undefined;

	return {
		async generateText({model, instructions, input}: TextGenerationRequest) {
			client ??= new OpenAI({apiKey: options.apiKey, maxRetries: 0});
			const response = await client.responses.create({
				model,
				instructions,
				input,
			});
			return response.output_text;
		},
	};
}
