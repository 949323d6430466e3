import type {JsonValidationError, StorageError} from './errors.js';

/**
 * A named snapshot of the settings file, as persisted in the metadata document
 */
export interface ConfigurationRecord {
	id: string;
	name: string;
	description: string;
	created_at: string; // ISO-8601
	file_path: string; // absolute path of the stored content
}

export type JsonObject = {[key: string]: unknown};

/**
 * Locations the registry works with. Both are injected; the registry never
 * resolves them from the environment itself.
 */
export interface RegistryPaths {
	rootDir: string;
	targetPath: string;
}

export interface ResolvedRegistryPaths extends RegistryPaths {
	configsDir: string;
	metadataPath: string;
	backupPath: string;
}

/**
 * Where the content of a new record comes from. Buffers are stored as they
 * are; strings are stored as UTF-8.
 */
export type ConfigSource = {path: string} | {content: string | Buffer};

export interface ApplyResult {
	record: ConfigurationRecord;
	targetPath: string;
	backupPath?: string; // set only when an existing target was backed up
}

export interface RemoveResult {
	record: ConfigurationRecord;
	fileRemoved: boolean;
	fileRemovalFailure?: string;
}

export type RecordValidationError = JsonValidationError | StorageError;

export interface ValidationFailure {
	record: ConfigurationRecord;
	error: RecordValidationError;
}

export interface ApplyFlags {
	confirm: boolean;
	force: boolean;
	dryRun: boolean;
}

export interface RemoveFlags {
	force: boolean;
	dryRun: boolean;
}

export interface ListFlags {
	detailed: boolean;
	json: boolean;
}

export interface ValidateFlags {
	verbose: boolean;
	all: boolean;
}

export interface AddFlags {
	name?: string;
	description?: string;
	from?: string;
}
