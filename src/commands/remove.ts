import {Effect} from 'effect';
import type {AppError} from '../types/errors.js';
import type {RemoveFlags} from '../types/index.js';
import {formatFileSize, formatTimestamp, pluralize} from '../utils/format.js';
import {getFileSize} from '../utils/storage.js';
import type {CommandContext} from './context.js';

/**
 * Delete a stored configuration. Without --force the user confirms twice,
 * the second time by typing the name.
 */
export function removeCommand(
	ctx: CommandContext,
	identifier: string,
	flags: RemoveFlags,
): Effect.Effect<void, AppError> {
	const {registry, output, prompter} = ctx;

	return Effect.gen(function* () {
		const record = yield* registry.get(identifier);

		output.log('🗑️  Configuration to remove:');
		output.log(`   ID: ${record.id}`);
		output.log(`   Name: ${record.name}`);
		if (record.description) {
			output.log(`   Description: ${record.description}`);
		}
		output.log(`   Created: ${formatTimestamp(record.created_at, true)}`);
		output.log(`   File: ${record.file_path}`);
		const size = getFileSize(record.file_path);
		if (size !== undefined) {
			output.log(`   Size: ${formatFileSize(size)}`);
		}
		output.log('');

		if (flags.dryRun) {
			output.log('🔍 DRY RUN MODE - No changes will be made');
			output.log(`Would remove file: ${record.file_path}`);
			output.log(`Would remove from configuration list: ${record.name}`);
			return;
		}

		if (!flags.force) {
			output.log('⚠️  Warning: This action cannot be undone!');
			output.log('   The configuration file will be permanently deleted.');
			output.log('');

			const sure = yield* prompter.confirm(
				`Are you sure you want to remove '${record.name}'?`,
			);
			if (!sure) {
				output.log('❌ Operation cancelled');
				return;
			}

			const typed = yield* prompter.text(
				'Type the configuration name to confirm:',
			);
			if (typed !== record.name) {
				output.log(
					'❌ Configuration name did not match. Operation cancelled',
				);
				return;
			}
		}

		output.log(`🗑️  Removing configuration '${record.name}'...`);
		const result = yield* registry.remove(record.id);

		output.log(`✅ Configuration '${record.name}' removed successfully!`);
		if (result.fileRemovalFailure) {
			output.error(
				`⚠️  The stored file could not be deleted: ${result.fileRemovalFailure}`,
			);
		}
		output.log('');

		const remaining = registry.list().length;
		if (remaining > 0) {
			output.log(`📋 ${pluralize(remaining, 'configuration')} remaining`);
			output.log(
				"💡 Use 'settings-switch list' to see remaining configurations",
			);
		} else {
			output.log('📋 No configurations remaining');
			output.log(
				"💡 Use 'settings-switch add' to create a new configuration",
			);
		}
	});
}
