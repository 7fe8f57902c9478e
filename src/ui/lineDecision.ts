import {createInterface} from 'node:readline/promises';
import {parseDecision, type Decision} from '../core/loop/decision';
import {bannerLines, DECISION_LABEL, INVALID_INPUT_TEXT} from './decisionText';

type Writer = {
	write: (chunk: string) => unknown;
};

export type LineReader = {
	/** Resolves with the next line, or null once the input has ended. */
	readLine: () => Promise<string | null>;
};

/**
 * Reads lines from a non-terminal stream. One reader serves every prompt
 * of a run, so lines piped in ahead of time are never dropped between
 * prompts.
 */
export function createLineReader(input: NodeJS.ReadableStream): LineReader {
	const rl = createInterface({input, terminal: false});
	const buffered: string[] = [];
	const waiting: Array<(line: string | null) => void> = [];
	let ended = false;

	rl.on('line', line => {
		const resolve = waiting.shift();
		if (resolve) {
			resolve(line);
		} else {
			buffered.push(line);
		}
	});

	rl.on('close', () => {
		ended = true;
		for (const resolve of waiting.splice(0)) {
			resolve(null);
		}
	});

	return {
		readLine() {
			const line = buffered.shift();
			if (line !== undefined) {
				return Promise.resolve(line);
			}
			if (ended) {
				return Promise.resolve(null);
			}
			return new Promise(resolve => {
				waiting.push(resolve);
			});
		},
	};
}

/**
 * Plain-text version of the decision prompt. Re-asks on invalid lines
 * without repeating the banner; end of input counts as a quit.
 */
export async function readLineDecision(
	message: string,
	reader: LineReader,
	stdout: Writer,
): Promise<Decision> {
	stdout.write(`${bannerLines(message).join('\n')}\n`);

	for (;;) {
		stdout.write(`${DECISION_LABEL} `);
		const line = await reader.readLine();
		stdout.write('\n');
		if (line === null) {
			return 'quit';
		}

		const decision = parseDecision(line);
		if (decision) {
			return decision;
		}
		stdout.write(`${INVALID_INPUT_TEXT}\n`);
	}
}
