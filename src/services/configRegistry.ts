import path from 'path';
import {randomUUID} from 'crypto';
import {Effect, Either} from 'effect';
import {
	ApplyError,
	CorruptMetadataError,
	DuplicateNameError,
	EmptyNameError,
	FileSystemError,
	NotFoundError,
	SourceNotFoundError,
	formatError,
	type JsonValidationError,
	type StorageError,
} from '../types/errors.js';
import type {
	ApplyResult,
	ConfigSource,
	ConfigurationRecord,
	RecordValidationError,
	RegistryPaths,
	RemoveResult,
	ResolvedRegistryPaths,
	ValidationFailure,
} from '../types/index.js';
import {deriveRegistryPaths} from '../utils/defaultPaths.js';
import {parseJson, validateJson} from '../utils/jsonValidation.js';
import {logger} from '../utils/logger.js';
import {
	atomicWrite,
	ensureDir,
	fileExists,
	readFileBytes,
	readTextFile,
	removeFile,
	safeCopy,
} from '../utils/storage.js';

function isRecordShape(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check one entry of the metadata document. A missing description is
 * tolerated and read as empty.
 */
function parseRecord(
	value: unknown,
	index: number,
): Either.Either<ConfigurationRecord, string> {
	if (!isRecordShape(value)) {
		return Either.left(`entry ${index} is not an object`);
	}

	const {id, name, description, created_at, file_path} = value;
	if (typeof id !== 'string' || id === '') {
		return Either.left(`entry ${index} has no id`);
	}
	if (typeof name !== 'string') {
		return Either.left(`entry ${index} has no name`);
	}
	if (typeof created_at !== 'string') {
		return Either.left(`entry ${index} has no created_at`);
	}
	if (typeof file_path !== 'string') {
		return Either.left(`entry ${index} has no file_path`);
	}
	if (description !== undefined && typeof description !== 'string') {
		return Either.left(`entry ${index} has a non-string description`);
	}

	return Either.right({
		id,
		name,
		description: description ?? '',
		created_at,
		file_path,
	});
}

/**
 * Registry of named settings snapshots.
 *
 * The whole collection lives in memory and is written back as one document
 * (`<root>/config.json`) after every add and remove. Each record's content is
 * stored in `<root>/configs/<id>.json`. Applying a record copies its content
 * onto the target file after saving the previous target in a single backup
 * slot.
 *
 * @example
 * ```typescript
 * const registry = new ConfigRegistry({rootDir, targetPath});
 * await Effect.runPromise(registry.open());
 * const record = await Effect.runPromise(
 *   registry.add({content: '{}'}, 'base', ''),
 * );
 * await Effect.runPromise(registry.apply(record.name));
 * ```
 */
export class ConfigRegistry {
	private readonly paths: ResolvedRegistryPaths;
	private configs: ConfigurationRecord[] = [];

	constructor(paths: RegistryPaths) {
		this.paths = deriveRegistryPaths(paths);
	}

	getPaths(): ResolvedRegistryPaths {
		return {...this.paths};
	}

	/**
	 * Create the storage directories and load the metadata document.
	 * A missing document is an empty registry.
	 */
	open(): Effect.Effect<void, FileSystemError | CorruptMetadataError> {
		// eslint-disable-next-line @typescript-eslint/no-this-alias
		const self = this;

		return Effect.gen(function* () {
			yield* ensureDir(self.paths.rootDir);
			yield* ensureDir(self.paths.configsDir);
			yield* self.reload();
		});
	}

	/**
	 * Re-read the metadata document from disk, replacing the in-memory collection
	 */
	reload(): Effect.Effect<void, FileSystemError | CorruptMetadataError> {
		// eslint-disable-next-line @typescript-eslint/no-this-alias
		const self = this;
		const {metadataPath} = this.paths;

		return Effect.gen(function* () {
			if (!fileExists(metadataPath)) {
				self.configs = [];
				logger.debug(`No metadata at ${metadataPath}, starting empty`);
				return;
			}

			const content = yield* readTextFile(metadataPath).pipe(
				Effect.catchTag('SourceNotFoundError', () => Effect.succeed('[]')),
			);

			const parsed = parseJson(content, metadataPath);
			if (Either.isLeft(parsed)) {
				return yield* Effect.fail(
					new CorruptMetadataError({
						metadataPath,
						details: parsed.left.details,
					}),
				);
			}

			const document = parsed.right;
			if (!Array.isArray(document)) {
				return yield* Effect.fail(
					new CorruptMetadataError({
						metadataPath,
						details: 'expected an array of configurations',
					}),
				);
			}

			const records: ConfigurationRecord[] = [];
			for (const [index, entry] of document.entries()) {
				const record = parseRecord(entry, index);
				if (Either.isLeft(record)) {
					return yield* Effect.fail(
						new CorruptMetadataError({metadataPath, details: record.left}),
					);
				}
				records.push(record.right);
			}

			self.configs = records;
			logger.debug(
				`Loaded ${records.length} configuration(s) from ${metadataPath}`,
			);
		});
	}

	private persist(): Effect.Effect<void, FileSystemError> {
		return atomicWrite(
			this.paths.metadataPath,
			`${JSON.stringify(this.configs, null, 2)}\n`,
		);
	}

	/**
	 * Store a new configuration.
	 *
	 * The name and description are trimmed. Content is validated before anything
	 * is written; if saving the metadata fails, the stored file is deleted again
	 * and the registry is left as it was.
	 */
	add(
		source: ConfigSource,
		name: string,
		description = '',
	): Effect.Effect<
		ConfigurationRecord,
		| EmptyNameError
		| DuplicateNameError
		| JsonValidationError
		| SourceNotFoundError
		| FileSystemError
	> {
		// eslint-disable-next-line @typescript-eslint/no-this-alias
		const self = this;

		return Effect.gen(function* () {
			const trimmedName = name.trim();
			if (trimmedName === '') {
				return yield* Effect.fail(new EmptyNameError());
			}
			if (self.configs.some(config => config.name === trimmedName)) {
				return yield* Effect.fail(
					new DuplicateNameError({configName: trimmedName}),
				);
			}

			const content =
				'content' in source
					? source.content
					: yield* readFileBytes(source.path);
			yield* validateJson(
				typeof content === 'string' ? content : content.toString('utf-8'),
				'path' in source ? source.path : undefined,
			);

			const id = randomUUID();
			const record: ConfigurationRecord = {
				id,
				name: trimmedName,
				description: description.trim(),
				created_at: new Date().toISOString(),
				file_path: path.join(self.paths.configsDir, `${id}.json`),
			};

			yield* atomicWrite(record.file_path, content);

			const previous = self.configs;
			self.configs = [...previous, record];

			yield* self.persist().pipe(
				Effect.tapError(error =>
					Effect.gen(function* () {
						self.configs = previous;
						logger.error(
							`Failed to save metadata while adding '${trimmedName}': ${formatError(error)}`,
						);
						const cleanup = yield* Effect.either(removeFile(record.file_path));
						if (Either.isLeft(cleanup)) {
							logger.error(
								`Could not remove ${record.file_path} during rollback: ${formatError(cleanup.left)}`,
							);
						}
					}),
				),
			);

			logger.info(`Added configuration '${record.name}' (${record.id})`);
			return record;
		});
	}

	/**
	 * Look a record up by id first, then by name
	 */
	get(identifier: string): Either.Either<ConfigurationRecord, NotFoundError> {
		const record =
			this.configs.find(config => config.id === identifier) ??
			this.configs.find(config => config.name === identifier);

		return record
			? Either.right(record)
			: Either.left(new NotFoundError({identifier}));
	}

	/**
	 * All records in insertion order
	 */
	list(): ConfigurationRecord[] {
		return [...this.configs];
	}

	/**
	 * Remove a record.
	 *
	 * The metadata is saved first, so the document never lists a record whose
	 * file is gone. Deleting the stored file afterwards is best effort: a file
	 * that is already absent is fine, any other failure is logged and reported
	 * in the result.
	 */
	remove(
		identifier: string,
	): Effect.Effect<RemoveResult, NotFoundError | FileSystemError> {
		// eslint-disable-next-line @typescript-eslint/no-this-alias
		const self = this;

		return Effect.gen(function* () {
			const record = yield* self.get(identifier);

			const previous = self.configs;
			self.configs = previous.filter(config => config.id !== record.id);

			yield* self.persist().pipe(
				Effect.tapError(error =>
					Effect.sync(() => {
						self.configs = previous;
						logger.error(
							`Failed to save metadata while removing '${record.name}': ${formatError(error)}`,
						);
					}),
				),
			);

			const removal = yield* Effect.either(removeFile(record.file_path));
			logger.info(`Removed configuration '${record.name}' (${record.id})`);

			if (Either.isLeft(removal)) {
				const reason = formatError(removal.left);
				logger.warn(`Stored file left behind: ${reason}`);
				return {record, fileRemoved: false, fileRemovalFailure: reason};
			}

			return {record, fileRemoved: removal.right};
		});
	}

	/**
	 * Copy a record onto the target file.
	 *
	 * The stored content is validated again first. An existing target is
	 * copied to the backup slot before it is overwritten; if writing the target
	 * then fails, the backup is copied back.
	 */
	apply(
		identifier: string,
	): Effect.Effect<
		ApplyResult,
		NotFoundError | JsonValidationError | StorageError | ApplyError
	> {
		// eslint-disable-next-line @typescript-eslint/no-this-alias
		const self = this;
		const {targetPath, backupPath} = this.paths;

		return Effect.gen(function* () {
			const record = yield* self.get(identifier);
			yield* self.validateRecord(record);

			let backedUp = false;
			if (fileExists(targetPath)) {
				yield* safeCopy(targetPath, backupPath);
				backedUp = true;
				logger.info(`Backed up ${targetPath} to ${backupPath}`);
			}

			yield* safeCopy(record.file_path, targetPath).pipe(
				Effect.catchAll(error =>
					Effect.gen(function* () {
						const cause = formatError(error);
						logger.error(`Failed to apply '${record.name}': ${cause}`);

						if (!backedUp) {
							return yield* Effect.fail(
								new ApplyError({
									configName: record.name,
									targetPath,
									cause,
									restoreAttempted: false,
								}),
							);
						}

						const restore = yield* Effect.either(
							safeCopy(backupPath, targetPath),
						);
						if (Either.isLeft(restore)) {
							const restoreFailure = formatError(restore.left);
							logger.error(`Failed to restore backup: ${restoreFailure}`);
							return yield* Effect.fail(
								new ApplyError({
									configName: record.name,
									targetPath,
									cause,
									restoreAttempted: true,
									restoreFailure,
								}),
							);
						}

						logger.warn(`Restored ${targetPath} from ${backupPath}`);
						return yield* Effect.fail(
							new ApplyError({
								configName: record.name,
								targetPath,
								cause,
								restoreAttempted: true,
							}),
						);
					}),
				),
			);

			logger.info(`Applied configuration '${record.name}' to ${targetPath}`);
			return backedUp
				? {record, targetPath, backupPath}
				: {record, targetPath};
		});
	}

	private validateRecord(
		record: ConfigurationRecord,
	): Effect.Effect<void, RecordValidationError> {
		return Effect.flatMap(readTextFile(record.file_path), content =>
			Effect.asVoid(validateJson(content, record.file_path)),
		);
	}

	/**
	 * Validate a stored configuration without changing anything
	 */
	validate(
		identifier: string,
	): Effect.Effect<void, NotFoundError | RecordValidationError> {
		return Effect.flatMap(this.get(identifier), record =>
			this.validateRecord(record),
		);
	}

	/**
	 * Validate every record, collecting each failure
	 */
	validateAll(): Effect.Effect<ValidationFailure[]> {
		return Effect.forEach(this.configs, record =>
			Effect.either(this.validateRecord(record)).pipe(
				Effect.map(result =>
					Either.isLeft(result) ? [{record, error: result.left}] : [],
				),
			),
		).pipe(Effect.map(results => results.flat()));
	}

	/**
	 * Records whose stored content is byte-identical to the current target.
	 * More than one can match when records share content.
	 */
	findActive(): Effect.Effect<ConfigurationRecord[], FileSystemError> {
		// eslint-disable-next-line @typescript-eslint/no-this-alias
		const self = this;

		return Effect.gen(function* () {
			const target = yield* readFileBytes(self.paths.targetPath).pipe(
				Effect.catchTag('SourceNotFoundError', () => Effect.succeed(null)),
			);
			if (target === null) {
				return [];
			}

			const active: ConfigurationRecord[] = [];
			for (const record of self.configs) {
				const stored = yield* Effect.either(readFileBytes(record.file_path));
				if (Either.isRight(stored) && stored.right.equals(target)) {
					active.push(record);
				}
			}
			return active;
		});
	}
}

/**
 * Construct and open a registry in one step
 */
export function openRegistry(
	paths: RegistryPaths,
): Effect.Effect<ConfigRegistry, FileSystemError | CorruptMetadataError> {
	const registry = new ConfigRegistry(paths);
	return Effect.as(registry.open(), registry);
}
