import React, {useCallback, useState} from 'react';
import {Box, Text} from 'ink';
import {TextInput} from '@inkjs/ui';
import {parseDecision, type Decision} from '../../core/loop/decision';
import {
	ACCEPT_QUESTION,
	BANNER_TITLE,
	DECISION_LABEL,
	INVALID_INPUT_TEXT,
	MESSAGE_RULE,
} from '../decisionText';

export type DecisionPromptProps = {
	message: string;
	onDecision: (decision: Decision) => void;
};

export default function DecisionPrompt({
	message,
	onDecision,
}: DecisionPromptProps) {
	const [invalidCount, setInvalidCount] = useState(0);

	const handleSubmit = useCallback(
		(value: string) => {
			const decision = parseDecision(value);
			if (decision) {
				onDecision(decision);
				return;
			}
			// Remounting the input clears it; the banner above stays put.
			setInvalidCount(count => count + 1);
		},
		[onDecision],
	);

	return (
		<Box flexDirection="column" marginTop={1}>
			<Text bold>{BANNER_TITLE}</Text>
			<Text dimColor>{MESSAGE_RULE}</Text>
			<Text>{message}</Text>
			<Text dimColor>{MESSAGE_RULE}</Text>
			<Box marginTop={1}>
				<Text>{ACCEPT_QUESTION}</Text>
			</Box>
			{invalidCount > 0 && <Text color="red">{INVALID_INPUT_TEXT}</Text>}
			<Box gap={1}>
				<Text color="cyan">{DECISION_LABEL}</Text>
				<TextInput key={invalidCount} onSubmit={handleSubmit} />
			</Box>
		</Box>
	);
}
