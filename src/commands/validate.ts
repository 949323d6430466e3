import {Effect} from 'effect';
import {ValidationError, formatError, type AppError} from '../types/errors.js';
import type {ConfigurationRecord, ValidateFlags} from '../types/index.js';
import {formatTimestamp} from '../utils/format.js';
import type {CommandContext} from './context.js';

function logRecordDetails(
	ctx: CommandContext,
	record: ConfigurationRecord,
): void {
	ctx.output.log(`   ID: ${record.id}`);
	ctx.output.log(`   File: ${record.file_path}`);
}

function validateOne(
	ctx: CommandContext,
	identifier: string,
	verbose: boolean,
): Effect.Effect<void, AppError> {
	const {registry, output} = ctx;

	return Effect.gen(function* () {
		const record = yield* registry.get(identifier);

		output.log(`🔍 Validating configuration: ${record.name}`);
		if (verbose) {
			logRecordDetails(ctx, record);
			if (record.description) {
				output.log(`   Description: ${record.description}`);
			}
			output.log(`   Created: ${formatTimestamp(record.created_at, true)}`);
		}

		yield* registry.validate(record.id).pipe(
			Effect.tapError(error =>
				Effect.sync(() =>
					output.error(`❌ Validation failed: ${formatError(error)}`),
				),
			),
		);
		output.log('✅ Configuration is valid');
	});
}

function validateEvery(
	ctx: CommandContext,
	verbose: boolean,
): Effect.Effect<void, AppError> {
	const {registry, output} = ctx;

	return Effect.gen(function* () {
		const records = registry.list();
		if (records.length === 0) {
			output.log('📭 No configurations found to validate');
			return;
		}

		output.log(`🔍 Validating ${records.length} configuration(s)...`);
		output.log('');

		const failures = yield* registry.validateAll();
		const failureById = new Map(
			failures.map(failure => [failure.record.id, failure.error]),
		);

		for (const record of records) {
			const error = failureById.get(record.id);
			output.log(
				error
					? `❌ ${record.name} - ${formatError(error)}`
					: `✅ ${record.name} - Valid`,
			);
			if (verbose) {
				logRecordDetails(ctx, record);
				output.log('');
			}
		}

		output.log('');
		output.log('📊 Validation Summary:');
		output.log(`   Valid: ${records.length - failures.length}`);
		output.log(`   Invalid: ${failures.length}`);
		output.log(`   Total: ${records.length}`);

		if (failures.length > 0) {
			if (!verbose) {
				output.log('');
				output.log(
					`⚠️  Found ${failures.length} invalid configuration(s). Use --verbose for details.`,
				);
			}
			return yield* Effect.fail(
				new ValidationError({
					field: 'configurations',
					constraint: `failed validation: ${failures.length} of ${records.length} invalid`,
					receivedValue: failures.map(failure => failure.record.name),
				}),
			);
		}

		output.log('');
		output.log('🎉 All configurations are valid!');
	});
}

/**
 * Check one stored configuration, or all of them
 */
export function validateCommand(
	ctx: CommandContext,
	identifier: string | undefined,
	flags: ValidateFlags,
): Effect.Effect<void, AppError> {
	return identifier !== undefined && !flags.all
		? validateOne(ctx, identifier, flags.verbose)
		: validateEvery(ctx, flags.verbose);
}
