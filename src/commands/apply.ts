import {Effect} from 'effect';
import type {AppError} from '../types/errors.js';
import type {ApplyFlags} from '../types/index.js';
import {formatFileSize, formatTimestamp} from '../utils/format.js';
import {fileExists, getFileSize, getModifiedTime} from '../utils/storage.js';
import {checkPrerequisites, type CommandContext} from './context.js';

function describeFile(filePath: string): string {
	const modified = getModifiedTime(filePath);
	const when = modified
		? formatTimestamp(modified.toISOString(), true)
		: 'unknown';
	return `${formatFileSize(getFileSize(filePath))}, modified ${when}`;
}

/**
 * Switch the settings file to a stored configuration
 */
export function applyCommand(
	ctx: CommandContext,
	identifier: string,
	flags: ApplyFlags,
): Effect.Effect<void, AppError> {
	const {registry, output, prompter} = ctx;
	const paths = registry.getPaths();

	return Effect.gen(function* () {
		yield* checkPrerequisites(paths);
		const record = yield* registry.get(identifier);
		const targetExists = fileExists(paths.targetPath);

		output.log(`🎯 Applying configuration: ${record.name}`);
		output.log(`   ID: ${record.id}`);
		if (record.description) {
			output.log(`   Description: ${record.description}`);
		}
		output.log(`   Target: ${paths.targetPath}`);
		if (targetExists) {
			output.log(`   Backup: ${paths.backupPath}`);
			output.log(`   Current file: ${describeFile(paths.targetPath)}`);
		} else {
			output.log('   Current: no existing settings file found');
		}
		output.log(`   New file: ${describeFile(record.file_path)}`);
		output.log('');

		if (flags.dryRun) {
			output.log('🔍 DRY RUN MODE - No changes will be made');
			if (targetExists) {
				output.log(`Would create backup: ${paths.backupPath}`);
			}
			output.log(`Would copy: ${record.file_path} -> ${paths.targetPath}`);
			return;
		}

		if (flags.confirm && !flags.force) {
			const proceed = yield* prompter.confirm(
				targetExists
					? 'This will replace your current settings. Continue?'
					: 'No existing settings file found. Continue?',
			);
			if (!proceed) {
				output.log('❌ Operation cancelled');
				return;
			}
		}

		output.log('🔄 Applying configuration...');
		const result = yield* registry.apply(record.id);

		output.log('✅ Configuration applied successfully!');
		if (result.backupPath) {
			output.log('');
			output.log(`💾 Backup saved: ${result.backupPath}`);
			output.log(
				`💡 To rollback: mv "${result.backupPath}" "${result.targetPath}"`,
			);
		}
		output.log('');
		output.log('🔄 Restart the application to see the changes');
	});
}
