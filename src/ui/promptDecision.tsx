import React from 'react';
import {render} from 'ink';
import type {Decision} from '../core/loop/decision';
import DecisionPrompt from './components/DecisionPrompt';
import {createLineReader, readLineDecision} from './lineDecision';

type Writer = {
	write: (chunk: string) => unknown;
};

export type DecisionPrompterStreams = {
	stdin: NodeJS.ReadableStream & {isTTY?: boolean};
	stdout: Writer;
};

/**
 * Renders the decision prompt for one message and resolves once the user
 * enters Y, R or Q. Ctrl+C ends the prompt as a quit.
 */
export async function promptDecision(message: string): Promise<Decision> {
	let decision: Decision = 'quit';

	const instance = render(
		<DecisionPrompt
			message={message}
			onDecision={value => {
				decision = value;
				instance.unmount();
			}}
		/>,
		{exitOnCtrlC: true},
	);

	await instance.waitUntilExit();
	return decision;
}

/**
 * Picks the ink prompt on a terminal and a line-by-line prompt otherwise,
 * since ink's input needs raw mode.
 */
export function createDecisionPrompter(
	streams: DecisionPrompterStreams = {
		stdin: process.stdin,
		stdout: process.stdout,
	},
): (message: string) => Promise<Decision> {
	if (streams.stdin.isTTY) {
		return promptDecision;
	}

	const reader = createLineReader(streams.stdin);
	return message => readLineDecision(message, reader, streams.stdout);
}
