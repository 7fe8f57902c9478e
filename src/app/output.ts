import chalk, {Chalk} from 'chalk';

type Writer = {
	write: (chunk: string) => unknown;
};

export type OutputWriterOptions = {
	verbose: boolean;
	stdout: Writer;
	stderr: Writer;
	/** Defaults to whatever chalk detects for the terminal. */
	color?: boolean;
};

export type OutputWriter = {
	info: (message: string) => void;
	success: (message: string) => void;
	error: (message: string) => void;
	debug: (message: string) => void;
};

function writeLine(writer: Writer, line: string): void {
	writer.write(line.endsWith('\n') ? line : `${line}\n`);
}

export function createOutputWriter(options: OutputWriterOptions): OutputWriter {
	const paint = new Chalk({
		level: (options.color ?? chalk.level > 0) ? chalk.level || 1 : 0,
	});

	return {
		info(message) {
			writeLine(options.stdout, message);
		},
		success(message) {
			writeLine(options.stdout, paint.green(message));
		},
		error(message) {
			writeLine(options.stderr, paint.red(message));
		},
		debug(message) {
			if (!options.verbose) return;
			writeLine(options.stderr, paint.dim(`[gitscribe] ${message}`));
		},
	};
}
