import {describe, it, expect, vi} from 'vitest';
import {GenerationError} from '../errors';
import {createMessageGenerator, NOTHING_STAGED_MESSAGE} from './messageGenerator';
import {COMMIT_INSTRUCTIONS} from './prompt';
import type {TextGenerationService} from './types';

function fakeService(impl: TextGenerationService['generateText']) {
	return {generateText: vi.fn(impl)};
}

describe('createMessageGenerator', () => {
	it('refuses an empty diff without calling the service', async () => {
		const service = fakeService(async () => 'feat: never - main');
		const generator = createMessageGenerator({service, model: 'gpt-4o-mini'});

		await expect(generator.generate('', 'main')).rejects.toThrow(
			GenerationError,
		);
		await expect(generator.generate('', 'main')).rejects.toThrow(
			NOTHING_STAGED_MESSAGE,
		);
		expect(service.generateText).not.toHaveBeenCalled();
	});

	it('sends the fixed instructions with the diff and branch', async () => {
		const service = fakeService(async () => 'feat: add greeting print - feature/x');
		const onRequest = vi.fn();
		const generator = createMessageGenerator({
			service,
			model: 'gpt-4o-mini',
			onRequest,
		});

		await generator.generate("+print('hi')", 'feature/x');

		expect(service.generateText).toHaveBeenCalledWith({
			model: 'gpt-4o-mini',
			instructions: COMMIT_INSTRUCTIONS,
			input: "Git Diff:\n+print('hi')\n\nBranch: feature/x",
		});
		expect(onRequest).toHaveBeenCalledWith({
			model: 'gpt-4o-mini',
			inputLength: "Git Diff:\n+print('hi')\n\nBranch: feature/x".length,
		});
	});

	it('trims the response and does not check its format', async () => {
		const generator = createMessageGenerator({
			service: fakeService(async () => '\n  added a greeting  \n'),
			model: 'gpt-4o-mini',
		});

		await expect(generator.generate('+x', 'main')).resolves.toBe(
			'added a greeting',
		);
	});

	it('wraps service failures in GenerationError and keeps the cause', async () => {
		const failure = new Error('401 Incorrect API key provided');
		const generator = createMessageGenerator({
			service: fakeService(async () => {
				throw failure;
			}),
			model: 'gpt-4o-mini',
		});

		const error = await generator.generate('+x', 'main').catch(e => e);

		expect(error).toBeInstanceOf(GenerationError);
		expect(error.message).toBe(
			'Error generating commit message: 401 Incorrect API key provided',
		);
		expect(error.cause).toBe(failure);
	});

	it('rejects a blank response', async () => {
		const generator = createMessageGenerator({
			service: fakeService(async () => '   '),
			model: 'gpt-4o-mini',
		});

		await expect(generator.generate('+x', 'main')).rejects.toThrow(
			'The AI service returned an empty commit message.',
		);
	});
});
