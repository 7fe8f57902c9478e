export {
	createMessageGenerator,
	NOTHING_STAGED_MESSAGE,
	type MessageGeneratorOptions,
} from './messageGenerator';
export {COMMIT_INSTRUCTIONS, buildPromptInput} from './prompt';
export type {
	MessageGenerator,
	TextGenerationRequest,
	TextGenerationService,
} from './types';
