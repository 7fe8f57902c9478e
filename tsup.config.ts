import {defineConfig} from 'tsup';

export default defineConfig({
	entry: {
		cli: 'src/app/entry/cli.ts',
	},
	format: ['esm'],
	target: 'node20',
	outDir: 'dist',
	clean: true,
	sourcemap: true,
	external: ['ink', 'react', '@inkjs/ui', 'react-devtools-core'],
});
