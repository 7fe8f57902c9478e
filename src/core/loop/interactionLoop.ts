import {UserAbortError} from '../errors';
import type {MessageGenerator} from '../generator/types';
import type {Decision} from './decision';

export type InteractionLoopOptions = {
	diff: string;
	branch: string;
	generator: MessageGenerator;
	/** Shows the message and resolves with a valid decision. */
	promptDecision: (message: string) => Promise<Decision>;
	/** Called before every generation, including regenerations. */
	onGenerate?: (attempt: number) => void;
};

/**
 * Generate, show, decide. Repeats on regenerate with the same diff and
 * branch until the user accepts (resolves with the accepted message) or
 * quits (rejects with UserAbortError).
 */
export async function runInteractionLoop(
	options: InteractionLoopOptions,
): Promise<string> {
	const {diff, branch, generator, promptDecision, onGenerate} = options;

	for (let attempt = 1; ; attempt += 1) {
		onGenerate?.(attempt);
		const message = await generator.generate(diff, branch);
		const decision = await promptDecision(message);

		switch (decision) {
			case 'accept':
				return message;
			case 'regenerate':
				continue;
			case 'quit':
				throw new UserAbortError();
		}
	}
}
