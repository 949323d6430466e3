#!/usr/bin/env node
import meow from 'meow';
import {Effect, Either} from 'effect';
import {resolveCommand, runCommand} from './commands/index.js';
import {openRegistry} from './services/configRegistry.js';
import {formatError} from './types/errors.js';
import {resolveRegistryPaths} from './utils/defaultPaths.js';
import {
	consoleOutput,
	inkPrompter,
	systemEditor,
} from './utils/interactive.js';
import {logger} from './utils/logger.js';

const cli = meow(
	`
	Usage
	  $ settings-switch <command> [options]

	Commands
	  add                          Create a configuration in your editor
	  list, ls, show               List stored configurations
	  apply <name-or-id>           Replace the settings file with a configuration
	  remove, rm <name-or-id>      Delete a configuration
	  validate [name-or-id]        Check stored configurations are valid JSON objects

	Options
	  --name, -n          Name for a new configuration (add)
	  --description, -d   Description for a new configuration (add)
	  --from              Read a new configuration from a file instead of the editor (add)
	  --detailed, -D      Show full IDs and descriptions (list)
	  --json, -j          Print configurations as JSON (list)
	  --confirm, -c       Ask before replacing the settings file (apply)
	  --force, -f         Skip confirmation prompts (apply, remove)
	  --dry-run           Show what would change without changing anything (apply, remove)
	  --verbose, -v       Show details for each configuration (validate)
	  --all, -a           Validate every configuration (validate)
	  --root              Registry directory (default: $SETTINGS_SWITCH_HOME or ~/.settings-switch)
	  --target            Settings file to manage (default: $CLAUDE_CONFIG_DIR/settings.json or ~/.claude/settings.json)
	  --help              Show help
	  --version           Show version

	Examples
	  $ settings-switch add --name work --description "Work setup"
	  $ settings-switch add --name minimal --from ./minimal.json
	  $ settings-switch list --detailed
	  $ settings-switch apply work --confirm
	  $ settings-switch remove work --dry-run
	  $ settings-switch validate --all --verbose
`,
	{
		importMeta: import.meta,
		flags: {
			name: {type: 'string', shortFlag: 'n'},
			description: {type: 'string', shortFlag: 'd'},
			from: {type: 'string'},
			detailed: {type: 'boolean', shortFlag: 'D', default: false},
			json: {type: 'boolean', shortFlag: 'j', default: false},
			confirm: {type: 'boolean', shortFlag: 'c', default: false},
			force: {type: 'boolean', shortFlag: 'f', default: false},
			dryRun: {type: 'boolean', default: false},
			verbose: {type: 'boolean', shortFlag: 'v', default: false},
			all: {type: 'boolean', shortFlag: 'a', default: false},
			root: {type: 'string'},
			target: {type: 'string'},
		},
	},
);

const [commandInput, ...args] = cli.input;
if (commandInput === undefined) {
	cli.showHelp(0);
}

const {root, target, ...flags} = cli.flags;

const program = Effect.gen(function* () {
	const command = yield* resolveCommand(commandInput ?? '');
	const paths = yield* resolveRegistryPaths({
		...(root !== undefined ? {root} : {}),
		...(target !== undefined ? {target} : {}),
	});
	const registry = yield* openRegistry(paths);

	logger.debug(`Running '${command}' with root ${paths.rootDir}`);
	yield* runCommand(
		{
			registry,
			output: consoleOutput,
			prompter: inkPrompter,
			editor: systemEditor,
		},
		command,
		args,
		flags,
	);
});

const result = await Effect.runPromise(Effect.either(program));
if (Either.isLeft(result)) {
	const message = formatError(result.left);
	logger.error(message);
	console.error(`Error: ${message}`);
	process.exitCode = 1;
}
