import {describe, it, expect, vi} from 'vitest';
import {UserAbortError} from '../errors';
import type {Decision} from './decision';
import {runInteractionLoop} from './interactionLoop';

function scriptedPrompt(decisions: Decision[]) {
	const queue = [...decisions];
	return vi.fn(async (_message: string): Promise<Decision> => {
		const next = queue.shift();
		if (!next) {
			throw new Error('prompted more times than scripted');
		}
		return next;
	});
}

function countingGenerator() {
	let calls = 0;
	return {
		generate: vi.fn(async (_diff: string, branch: string) => {
			calls += 1;
			return `feat: attempt ${calls} - ${branch}`;
		}),
	};
}

describe('runInteractionLoop', () => {
	it('returns the first message when accepted', async () => {
		const generator = countingGenerator();
		const promptDecision = scriptedPrompt(['accept']);

		const message = await runInteractionLoop({
			diff: '+x',
			branch: 'main',
			generator,
			promptDecision,
		});

		expect(message).toBe('feat: attempt 1 - main');
		expect(promptDecision).toHaveBeenCalledWith('feat: attempt 1 - main');
	});

	it('returns the message current at acceptance after regenerating', async () => {
		const generator = countingGenerator();
		const onGenerate = vi.fn();

		const message = await runInteractionLoop({
			diff: '+x',
			branch: 'main',
			generator,
			promptDecision: scriptedPrompt(['regenerate', 'regenerate', 'accept']),
			onGenerate,
		});

		expect(message).toBe('feat: attempt 3 - main');
		expect(onGenerate.mock.calls).toEqual([[1], [2], [3]]);
	});

	it('reuses the same diff and branch for every generation', async () => {
		const generator = countingGenerator();

		await runInteractionLoop({
			diff: '+unchanged',
			branch: 'feature/y',
			generator,
			promptDecision: scriptedPrompt(['regenerate', 'regenerate', 'accept']),
		});

		expect(generator.generate.mock.calls).toEqual([
			['+unchanged', 'feature/y'],
			['+unchanged', 'feature/y'],
			['+unchanged', 'feature/y'],
		]);
	});

	it('rejects with UserAbortError on quit', async () => {
		const generator = countingGenerator();

		await expect(
			runInteractionLoop({
				diff: '+x',
				branch: 'main',
				generator,
				promptDecision: scriptedPrompt(['regenerate', 'quit']),
			}),
		).rejects.toBeInstanceOf(UserAbortError);
		expect(generator.generate).toHaveBeenCalledTimes(2);
	});

	it('stops at the first generation failure', async () => {
		const promptDecision = scriptedPrompt(['accept']);

		await expect(
			runInteractionLoop({
				diff: '+x',
				branch: 'main',
				generator: {
					generate: vi.fn(async () => {
						throw new Error('offline');
					}),
				},
				promptDecision,
			}),
		).rejects.toThrow('offline');
		expect(promptDecision).not.toHaveBeenCalled();
	});
});
