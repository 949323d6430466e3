import React from 'react';
import {Effect} from 'effect';
import ConfigList, {type ConfigListRow} from '../components/ConfigList.js';
import type {AppError} from '../types/errors.js';
import type {ListFlags} from '../types/index.js';
import {pluralize} from '../utils/format.js';
import {getFileSize} from '../utils/storage.js';
import type {CommandContext} from './context.js';

export function listCommand(
	ctx: CommandContext,
	flags: ListFlags,
): Effect.Effect<void, AppError> {
	const {registry, output} = ctx;

	return Effect.gen(function* () {
		const records = registry.list();

		if (flags.json) {
			output.log(JSON.stringify(records, null, 2));
			return;
		}

		if (records.length === 0) {
			output.log('📋 No configurations found.');
			output.log('');
			output.log(
				"💡 Use 'settings-switch add' to create your first configuration",
			);
			return;
		}

		const active = new Set(
			(yield* registry.findActive()).map(record => record.id),
		);
		const rows: ConfigListRow[] = records.map(record => ({
			record,
			size: getFileSize(record.file_path),
			active: active.has(record.id),
		}));

		output.log(`📋 Found ${pluralize(records.length, 'configuration')}:`);
		output.log('');
		output.render(<ConfigList rows={rows} detailed={flags.detailed} />);
		output.log('');
		if (active.size > 0) {
			output.log('* matches the current settings file');
		}
		output.log(
			"💡 Use 'settings-switch apply <name>' to switch to a configuration",
		);
		output.log(
			"💡 Use 'settings-switch remove <name>' to delete a configuration",
		);
		if (!flags.detailed) {
			output.log(
				"💡 Use '--detailed' flag to see full IDs and descriptions",
			);
		}
	});
}
