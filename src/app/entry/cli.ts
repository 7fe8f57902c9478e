#!/usr/bin/env node
import dotenv from 'dotenv';
import meow from 'meow';
import {errorDetail} from '../../core/errors';
import {createMessageGenerator} from '../../core/generator/index';
import {createOpenAITextService} from '../../infra/ai/openaiService';
import {readConfig} from '../../infra/config';
import {
	createCommitExecutor,
	createGitRunner,
	createRepositoryInspector,
} from '../../infra/git/index';
import {createDecisionPrompter} from '../../ui/promptDecision';
import {createOutputWriter} from '../output';
import {COMMIT_EXIT_CODE, runCommitCommand} from './commitCommand';

const cli = meow(
	`
		Usage
		  $ gitscribe [options]

		Writes a commit message for the staged changes with OpenAI,
		then asks whether to commit it, generate another, or quit.

		Options
			--verbose   Log diagnostics to stderr
			--help      Show command help
			--version   Show CLI version

		Environment
			OPENAI_API_KEY   API key for the OpenAI Responses API
			                 (also read from ./.env)

		Examples
		  $ git add -p && gitscribe
		  $ gitscribe --verbose
	`,
	{
		importMeta: import.meta,
		allowUnknownFlags: false,
		flags: {
			verbose: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

async function main(): Promise<number> {
	if (cli.input.length > 0) {
		console.error('Usage: gitscribe [--verbose]');
		return COMMIT_EXIT_CODE.FAILURE;
	}

	dotenv.config();
	const config = readConfig(process.env);
	const output = createOutputWriter({
		verbose: cli.flags.verbose,
		stdout: process.stdout,
		stderr: process.stderr,
	});
	const git = createGitRunner({cwd: process.cwd()});

	return runCommitCommand({
		inspector: createRepositoryInspector(git),
		committer: createCommitExecutor(git),
		generator: createMessageGenerator({
			service: createOpenAITextService({apiKey: config.apiKey}),
			model: config.model,
			onRequest: ({model, inputLength}) => {
				output.debug(`requesting ${model} with ${inputLength} input chars`);
			},
		}),
		promptDecision: createDecisionPrompter(),
		output,
	});
}

main().then(
	code => {
		process.exit(code);
	},
	(error: unknown) => {
		console.error(
			`An unexpected error has occurred: ${errorDetail(error)}`,
		);
		process.exit(COMMIT_EXIT_CODE.FAILURE);
	},
);
