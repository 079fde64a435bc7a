import path from 'node:path';
import { cac } from 'cac';
import { TypeNameRegistry } from './registry';
import { loadTypeNames } from './names';
import { evaluateMacroDetailed } from './evaluate';
import { listCandidateMacros } from './batch';
import { formatDiagnostic } from './diagCodes';
import { setDebugLogging, debug } from './log';

type CliOptions = {
	include?: string | string[];
	define?: string | string[];
	names?: string;
	maxDepth?: number | string;
	debug?: boolean;
};

function list(v: string | string[] | undefined): string[] {
	if (v === undefined) return [];
	return Array.isArray(v) ? v : [v];
}

function parseMaxDepth(v: number | string | undefined): number | undefined {
	if (v === undefined) return undefined;
	const n = Number(v);
	if (!Number.isInteger(n) || n < 1) throw new Error(`--max-depth expects a positive integer, got '${v}'`);
	return n;
}

export function run(argv: string[] = process.argv): number {
	const cli = cac('macro-init');
	let exitCode = 0;

	cli
		.command('<header> [...macros]', 'Rewrite compound-literal macros of a C header as named-field initializers')
		.option('-I, --include <dir>', 'Add an include directory (repeatable)')
		.option('-D, --define <def>', 'Define a macro, NAME or NAME=VALUE (repeatable)')
		.option('--names <file>', 'JSON or YAML mapping of type identities to binding names')
		.option('--max-depth <n>', 'Deepest record nesting to serialize')
		.option('--debug', 'Print front-end diagnostics and debug output', { default: false })
		.action((header: string, macros: string[], options: CliOptions) => {
			if (options.debug) setDebugLogging(true);
			const compilerArgs = [
				...list(options.include).map(d => `-I${d}`),
				...list(options.define).map(d => `-D${d}`),
			];
			const registry = options.names ? loadTypeNames(path.resolve(options.names)) : new TypeNameRegistry();
			const maxDepth = parseMaxDepth(options.maxDepth);
			const engine = { registry, compilerArgs, maxDepth };
			const names = macros.length ? macros : listCandidateMacros(header, engine);
			let produced = 0;
			for (const name of names) {
				const result = evaluateMacroDetailed(header, name, engine);
				if (result.ok) {
					console.log(result.evaluation.declaration);
					produced++;
					continue;
				}
				debug('cli', `${name}: ${result.reason}`);
				if (!options.debug) continue;
				for (const d of result.diagnostics) console.error(formatDiagnostic(d, result.sources?.locate(d.file, d.span.start)));
			}
			if (produced === 0) exitCode = 1;
		});

	cli.help();
	cli.version('0.1.0');
	try {
		cli.parse(argv, { run: false });
		if (cli.matchedCommand) cli.runMatchedCommand();
		else if (!cli.options.help && !cli.options.version) { cli.outputHelp(); exitCode = 1; }
	} catch (err) {
		console.error(`macro-init: ${err instanceof Error ? err.message : String(err)}`);
		return 1;
	}
	return exitCode;
}
