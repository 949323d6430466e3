import os from 'os';
import path from 'path';
import {Effect, Either} from 'effect';
import {DEFAULT_SETTINGS_CONTENT} from '../constants/defaultSettings.js';
import {
	ValidationError,
	formatError,
	type AppError,
} from '../types/errors.js';
import type {AddFlags, ConfigSource} from '../types/index.js';
import {expandPath} from '../utils/defaultPaths.js';
import {formatTimestamp} from '../utils/format.js';
import {validateJson} from '../utils/jsonValidation.js';
import {logger} from '../utils/logger.js';
import {
	atomicWrite,
	fileExists,
	readFileBytes,
	removeFile,
	safeCopy,
} from '../utils/storage.js';
import {checkPrerequisites, type CommandContext} from './context.js';

export function draftPathFor(pid: number = process.pid): string {
	return path.join(os.tmpdir(), `settings-switch-${pid}.json`);
}

/**
 * Seed the draft with the current settings, or the default skeleton when
 * there are none yet
 */
function seedDraft(
	draftPath: string,
	targetPath: string,
): Effect.Effect<void, AppError> {
	return fileExists(targetPath)
		? safeCopy(targetPath, draftPath)
		: atomicWrite(draftPath, DEFAULT_SETTINGS_CONTENT);
}

/**
 * Open the draft in the editor until it holds a JSON object or the user
 * gives up
 */
function editDraft(
	ctx: CommandContext,
	draftPath: string,
): Effect.Effect<Buffer, AppError> {
	const {output, prompter, editor} = ctx;

	return Effect.gen(function* () {
		output.log('🎯 Creating new configuration...');
		output.log(`📝 Opening editor for file: ${draftPath}`);
		output.log('📋 Instructions:');
		output.log('   • Edit the JSON configuration as needed');
		output.log('   • Save and close the editor to continue');
		output.log('   • Press Ctrl+C to cancel');
		output.log('');

		for (;;) {
			yield* editor.open(draftPath);

			const content = yield* readFileBytes(draftPath);
			const checked = yield* Effect.either(
				validateJson(content.toString('utf-8'), draftPath),
			);
			if (Either.isRight(checked)) {
				return content;
			}

			output.error(`❌ ${formatError(checked.left)}`);
			const again = yield* prompter.confirm('Do you want to edit again?');
			if (!again) {
				return yield* Effect.fail(
					new ValidationError({
						field: 'configuration',
						constraint: 'creation cancelled due to invalid JSON',
						receivedValue: draftPath,
					}),
				);
			}
		}
	});
}

function promptForName(
	ctx: CommandContext,
	flags: AddFlags,
): Effect.Effect<string, ValidationError> {
	if (flags.name !== undefined) {
		return Effect.succeed(flags.name.trim());
	}
	return Effect.map(
		ctx.prompter.text('Configuration name:', {placeholder: 'e.g. work'}),
		name => name ?? '',
	);
}

function promptForDescription(
	ctx: CommandContext,
	flags: AddFlags,
): Effect.Effect<string, ValidationError> {
	if (flags.description !== undefined || flags.name !== undefined) {
		return Effect.succeed((flags.description ?? '').trim());
	}
	return Effect.map(
		ctx.prompter.text('Description (optional):'),
		description => description ?? '',
	);
}

/**
 * Create a configuration from a file (`--from`) or from an editor session
 * seeded with the current settings
 */
export function addCommand(
	ctx: CommandContext,
	flags: AddFlags,
	draftPath: string = draftPathFor(),
): Effect.Effect<void, AppError> {
	const {registry, output, editor} = ctx;
	const paths = registry.getPaths();

	const obtainContent: Effect.Effect<ConfigSource, AppError> =
		flags.from !== undefined
			? Effect.gen(function* () {
					const sourcePath = expandPath(flags.from ?? '');
					const content = yield* readFileBytes(sourcePath);
					yield* validateJson(content.toString('utf-8'), sourcePath);
					return {content};
				})
			: Effect.gen(function* () {
					yield* editor.ensureAvailable();
					yield* seedDraft(draftPath, paths.targetPath);
					const content = yield* editDraft(ctx, draftPath);
					return {content};
				}).pipe(
					Effect.ensuring(
						removeFile(draftPath).pipe(
							Effect.tapError(error =>
								Effect.sync(() =>
									logger.warn(`Could not remove draft: ${formatError(error)}`),
								),
							),
							Effect.ignore,
						),
					),
				);

	return Effect.gen(function* () {
		yield* checkPrerequisites(paths);
		const source = yield* obtainContent;

		const name = yield* promptForName(ctx, flags);
		const description = yield* promptForDescription(ctx, flags);
		const record = yield* registry.add(source, name, description);

		output.log('');
		output.log('✅ Configuration added successfully!');
		output.log(`   ID: ${record.id}`);
		output.log(`   Name: ${record.name}`);
		if (record.description) {
			output.log(`   Description: ${record.description}`);
		}
		output.log(`   Created: ${formatTimestamp(record.created_at, true)}`);
		output.log('');
		output.log(
			`💡 Use 'settings-switch apply ${record.name}' to switch to this configuration`,
		);
	});
}
