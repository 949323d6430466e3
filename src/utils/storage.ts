/**
 * @fileoverview Storage primitives shared by every registry mutation.
 * Writes go through a sibling temporary file and a rename, so a reader never
 * sees a partially written file and a failed write leaves the original intact.
 */

import path from 'path';
import {
	existsSync,
	mkdirSync,
	readFileSync,
	renameSync,
	rmSync,
	statSync,
	unlinkSync,
	writeFileSync,
} from 'fs';
import {Effect} from 'effect';
import {FileSystemError, SourceNotFoundError} from '../types/errors.js';

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
	return (
		typeof error === 'object' &&
		error !== null &&
		'code' in error &&
		error.code === 'ENOENT'
	);
}

export function tempPathFor(filePath: string): string {
	return `${filePath}.${process.pid}.tmp`;
}

/**
 * Existence probe; says nothing about whether the content is readable
 */
export function fileExists(filePath: string): boolean {
	return existsSync(filePath);
}

export function ensureDir(dir: string): Effect.Effect<void, FileSystemError> {
	return Effect.try({
		try: () => {
			mkdirSync(dir, {recursive: true});
		},
		catch: error =>
			new FileSystemError({
				operation: 'mkdir',
				path: dir,
				cause: describe(error),
			}),
	});
}

/**
 * Write content atomically: temp file first, then rename into place.
 * The temp file is removed when either step fails.
 */
export function atomicWrite(
	filePath: string,
	data: string | Buffer,
): Effect.Effect<void, FileSystemError> {
	const tempFile = tempPathFor(filePath);
	const cleanup = Effect.try(() => rmSync(tempFile, {force: true})).pipe(
		Effect.ignore,
	);

	return Effect.gen(function* () {
		yield* ensureDir(path.dirname(filePath));

		yield* Effect.try({
			try: () => writeFileSync(tempFile, data),
			catch: error =>
				new FileSystemError({
					operation: 'write',
					path: filePath,
					cause: describe(error),
				}),
		}).pipe(Effect.tapError(() => cleanup));

		yield* Effect.try({
			try: () => renameSync(tempFile, filePath),
			catch: error =>
				new FileSystemError({
					operation: 'rename',
					path: filePath,
					cause: describe(error),
				}),
		}).pipe(Effect.tapError(() => cleanup));
	});
}

/**
 * Read a file as UTF-8 text
 */
export function readTextFile(
	filePath: string,
): Effect.Effect<string, SourceNotFoundError | FileSystemError> {
	return Effect.try({
		try: () => readFileSync(filePath, 'utf-8'),
		catch: error =>
			isNotFound(error)
				? new SourceNotFoundError({path: filePath})
				: new FileSystemError({
						operation: 'read',
						path: filePath,
						cause: describe(error),
					}),
	});
}

export function readFileBytes(
	filePath: string,
): Effect.Effect<Buffer, SourceNotFoundError | FileSystemError> {
	return Effect.try({
		try: () => readFileSync(filePath),
		catch: error =>
			isNotFound(error)
				? new SourceNotFoundError({path: filePath})
				: new FileSystemError({
						operation: 'read',
						path: filePath,
						cause: describe(error),
					}),
	});
}

/**
 * Copy a file byte-for-byte, writing the destination atomically
 */
export function safeCopy(
	src: string,
	dst: string,
): Effect.Effect<void, SourceNotFoundError | FileSystemError> {
	return Effect.gen(function* () {
		if (!fileExists(src)) {
			return yield* Effect.fail(new SourceNotFoundError({path: src}));
		}

		const data = yield* readFileBytes(src);
		yield* atomicWrite(dst, data);
	});
}

/**
 * Delete a file. A file that is already gone counts as success and yields false.
 */
export function removeFile(
	filePath: string,
): Effect.Effect<boolean, FileSystemError> {
	return Effect.try({
		try: () => {
			unlinkSync(filePath);
			return true;
		},
		catch: error => error,
	}).pipe(
		Effect.catchAll(error =>
			isNotFound(error)
				? Effect.succeed(false)
				: Effect.fail(
						new FileSystemError({
							operation: 'delete',
							path: filePath,
							cause: describe(error),
						}),
					),
		),
	);
}

/**
 * Size in bytes, or undefined when the file cannot be stat'ed
 */
export function getFileSize(filePath: string): number | undefined {
	try {
		return statSync(filePath).size;
	} catch {
		return undefined;
	}
}

export function getModifiedTime(filePath: string): Date | undefined {
	try {
		return statSync(filePath).mtime;
	} catch {
		return undefined;
	}
}
