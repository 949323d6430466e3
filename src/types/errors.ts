import {Data} from 'effect';

/**
 * Content did not parse as JSON
 */
export class InvalidJsonError extends Data.TaggedError('InvalidJsonError')<{
	readonly details: string;
	readonly path?: string;
}> {}

/**
 * Content parsed as JSON but the top-level value is not an object
 */
export class NotAnObjectError extends Data.TaggedError('NotAnObjectError')<{
	readonly receivedType: 'array' | 'null' | 'string' | 'number' | 'boolean';
	readonly path?: string;
}> {}

export class EmptyNameError extends Data.TaggedError('EmptyNameError')<{}> {}

export class DuplicateNameError extends Data.TaggedError('DuplicateNameError')<{
	readonly configName: string;
}> {}

/**
 * No record matches the identifier by id or by name
 */
export class NotFoundError extends Data.TaggedError('NotFoundError')<{
	readonly identifier: string;
}> {}

export class SourceNotFoundError extends Data.TaggedError(
	'SourceNotFoundError',
)<{
	readonly path: string;
}> {}

/**
 * File system operation errors
 * Used when file system operations (read, write, rename, delete, mkdir, stat) fail
 */
export class FileSystemError extends Data.TaggedError('FileSystemError')<{
	readonly operation: 'read' | 'write' | 'rename' | 'delete' | 'mkdir' | 'stat';
	readonly path: string;
	readonly cause: string;
}> {}

/**
 * The metadata document exists but cannot be loaded
 */
export class CorruptMetadataError extends Data.TaggedError(
	'CorruptMetadataError',
)<{
	readonly metadataPath: string;
	readonly details: string;
}> {}

/**
 * Copying a record onto the target file failed.
 * `restoreFailure` is set when restoring the backup failed as well.
 */
export class ApplyError extends Data.TaggedError('ApplyError')<{
	readonly configName: string;
	readonly targetPath: string;
	readonly cause: string;
	readonly restoreAttempted: boolean;
	readonly restoreFailure?: string;
}> {}

export class EditorNotFoundError extends Data.TaggedError(
	'EditorNotFoundError',
)<{
	readonly searched: readonly string[];
}> {}

/**
 * Process errors
 * Used when spawning an external program fails or it exits unsuccessfully
 */
export class ProcessError extends Data.TaggedError('ProcessError')<{
	readonly command: string;
	readonly signal?: string;
	readonly exitCode?: number;
	readonly message: string;
}> {}

/**
 * Validation errors
 * Used when command input or environment checks fail
 */
export class ValidationError extends Data.TaggedError('ValidationError')<{
	readonly field: string;
	readonly constraint: string;
	readonly receivedValue: unknown;
}> {}

export type JsonValidationError = InvalidJsonError | NotAnObjectError;

export type StorageError = SourceNotFoundError | FileSystemError;

/**
 * Union type for all application errors
 * Enables discriminated union type narrowing using _tag property
 */
export type AppError =
	| InvalidJsonError
	| NotAnObjectError
	| EmptyNameError
	| DuplicateNameError
	| NotFoundError
	| SourceNotFoundError
	| FileSystemError
	| CorruptMetadataError
	| ApplyError
	| EditorNotFoundError
	| ProcessError
	| ValidationError;

/**
 * Render an application error as a single human-readable line
 */
export function formatError(error: AppError): string {
	switch (error._tag) {
		case 'InvalidJsonError':
			return error.path
				? `invalid JSON in ${error.path}: ${error.details}`
				: `invalid JSON: ${error.details}`;
		case 'NotAnObjectError':
			return error.path
				? `${error.path} must contain a JSON object, not ${error.receivedType}`
				: `settings must be a JSON object, not ${error.receivedType}`;
		case 'EmptyNameError':
			return 'configuration name cannot be empty';
		case 'DuplicateNameError':
			return `configuration with name '${error.configName}' already exists`;
		case 'NotFoundError':
			return `configuration not found: ${error.identifier}`;
		case 'SourceNotFoundError':
			return `source file does not exist: ${error.path}`;
		case 'FileSystemError':
			return `failed to ${error.operation} ${error.path}: ${error.cause}`;
		case 'CorruptMetadataError':
			return `failed to parse configuration metadata ${error.metadataPath}: ${error.details}`;
		case 'ApplyError': {
			const base = `failed to apply configuration '${error.configName}' to ${error.targetPath}: ${error.cause}`;
			if (error.restoreFailure) {
				return `${base} (restoring backup also failed: ${error.restoreFailure})`;
			}
			return error.restoreAttempted ? `${base} (previous settings restored)` : base;
		}
		case 'EditorNotFoundError':
			return `no editor found (tried ${error.searched.join(', ')}). Set $EDITOR or install a default editor`;
		case 'ProcessError':
			return `${error.command}: ${error.message}`;
		case 'ValidationError':
			return `${error.field} ${error.constraint}`;
	}
}
