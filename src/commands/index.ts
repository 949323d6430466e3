import {Effect, Either} from 'effect';
import {ValidationError, type AppError} from '../types/errors.js';
import {addCommand} from './add.js';
import {applyCommand} from './apply.js';
import type {CommandContext} from './context.js';
import {listCommand} from './list.js';
import {removeCommand} from './remove.js';
import {validateCommand} from './validate.js';

export type CommandName = 'add' | 'list' | 'apply' | 'remove' | 'validate';

export const COMMAND_ALIASES: Readonly<Record<string, CommandName>> = {
	add: 'add',
	list: 'list',
	ls: 'list',
	show: 'list',
	apply: 'apply',
	remove: 'remove',
	rm: 'remove',
	delete: 'remove',
	del: 'remove',
	validate: 'validate',
};

export interface CommandFlags {
	name?: string;
	description?: string;
	from?: string;
	detailed: boolean;
	json: boolean;
	confirm: boolean;
	force: boolean;
	dryRun: boolean;
	verbose: boolean;
	all: boolean;
}

export function resolveCommand(
	input: string,
): Either.Either<CommandName, ValidationError> {
	const command = COMMAND_ALIASES[input];
	return command
		? Either.right(command)
		: Either.left(
				new ValidationError({
					field: 'command',
					constraint: `'${input}' is not recognised (expected one of add, list, apply, remove, validate)`,
					receivedValue: input,
				}),
			);
}

function requireIdentifier(
	command: CommandName,
	args: readonly string[],
): Either.Either<string, ValidationError> {
	const [identifier] = args;
	return identifier !== undefined && args.length === 1
		? Either.right(identifier)
		: Either.left(
				new ValidationError({
					field: command,
					constraint: 'requires exactly one <name-or-id> argument',
					receivedValue: args,
				}),
			);
}

/**
 * Dispatch a parsed invocation to its command
 */
export function runCommand(
	ctx: CommandContext,
	command: CommandName,
	args: readonly string[],
	flags: CommandFlags,
): Effect.Effect<void, AppError> {
	switch (command) {
		case 'add':
			return addCommand(ctx, {
				...(flags.name !== undefined ? {name: flags.name} : {}),
				...(flags.description !== undefined
					? {description: flags.description}
					: {}),
				...(flags.from !== undefined ? {from: flags.from} : {}),
			});
		case 'list':
			return listCommand(ctx, {detailed: flags.detailed, json: flags.json});
		case 'apply':
			return Effect.flatMap(requireIdentifier(command, args), identifier =>
				applyCommand(ctx, identifier, {
					confirm: flags.confirm,
					force: flags.force,
					dryRun: flags.dryRun,
				}),
			);
		case 'remove':
			return Effect.flatMap(requireIdentifier(command, args), identifier =>
				removeCommand(ctx, identifier, {
					force: flags.force,
					dryRun: flags.dryRun,
				}),
			);
		case 'validate':
			return validateCommand(ctx, args[0], {
				verbose: flags.verbose,
				all: flags.all,
			});
	}
}
