import {describe, it, expect} from 'vitest';
import {
	ApplyError,
	CorruptMetadataError,
	DuplicateNameError,
	EditorNotFoundError,
	EmptyNameError,
	FileSystemError,
	InvalidJsonError,
	NotAnObjectError,
	NotFoundError,
	ProcessError,
	SourceNotFoundError,
	ValidationError,
	formatError,
	type AppError,
} from './errors.js';

/**
 * Tests for structured error types using Effect-ts Data.TaggedError
 */
describe('Error Types', () => {
	describe('DuplicateNameError', () => {
		it('should keep the Error name intact', () => {
			const error = new DuplicateNameError({configName: 'work'});

			expect(error).toBeInstanceOf(Error);
			expect(error._tag).toBe('DuplicateNameError');
			expect(error.name).toBe('DuplicateNameError');
			expect(error.configName).toBe('work');
		});
	});

	describe('FileSystemError', () => {
		it('should create FileSystemError with required fields', () => {
			const error = new FileSystemError({
				operation: 'read',
				path: '/tmp/config.json',
				cause: 'ENOENT: no such file or directory',
			});

			expect(error._tag).toBe('FileSystemError');
			expect(error.operation).toBe('read');
			expect(error.path).toBe('/tmp/config.json');
			expect(error.stack).toBeDefined();
		});
	});

	describe('discriminated union', () => {
		it('should narrow on _tag', () => {
			const errors: AppError[] = [
				new EmptyNameError(),
				new NotFoundError({identifier: 'x'}),
			];

			const tags = errors.map(error => {
				switch (error._tag) {
					case 'EmptyNameError':
						return 'empty';
					case 'NotFoundError':
						return error.identifier;
					default:
						return 'other';
				}
			});

			expect(tags).toEqual(['empty', 'x']);
		});
	});
});

describe('formatError', () => {
	it('should describe JSON failures with and without a path', () => {
		expect(formatError(new InvalidJsonError({details: 'Unexpected token'}))).toBe(
			'invalid JSON: Unexpected token',
		);
		expect(
			formatError(
				new InvalidJsonError({details: 'Unexpected token', path: '/a.json'}),
			),
		).toBe('invalid JSON in /a.json: Unexpected token');
		expect(formatError(new NotAnObjectError({receivedType: 'array'}))).toBe(
			'settings must be a JSON object, not array',
		);
		expect(
			formatError(new NotAnObjectError({receivedType: 'null', path: '/b.json'})),
		).toBe('/b.json must contain a JSON object, not null');
	});

	it('should describe registry failures', () => {
		expect(formatError(new EmptyNameError())).toBe(
			'configuration name cannot be empty',
		);
		expect(formatError(new DuplicateNameError({configName: 'work'}))).toBe(
			"configuration with name 'work' already exists",
		);
		expect(formatError(new NotFoundError({identifier: 'ghost'}))).toBe(
			'configuration not found: ghost',
		);
		expect(formatError(new SourceNotFoundError({path: '/x.json'}))).toBe(
			'source file does not exist: /x.json',
		);
		expect(
			formatError(
				new FileSystemError({operation: 'write', path: '/y', cause: 'EACCES'}),
			),
		).toBe('failed to write /y: EACCES');
		expect(
			formatError(
				new CorruptMetadataError({metadataPath: '/r/config.json', details: 'bad'}),
			),
		).toBe('failed to parse configuration metadata /r/config.json: bad');
	});

	it('should say whether the previous settings were restored', () => {
		const base = {configName: 'work', targetPath: '/t.json', cause: 'disk full'};

		expect(formatError(new ApplyError({...base, restoreAttempted: false}))).toBe(
			"failed to apply configuration 'work' to /t.json: disk full",
		);
		expect(formatError(new ApplyError({...base, restoreAttempted: true}))).toBe(
			"failed to apply configuration 'work' to /t.json: disk full (previous settings restored)",
		);
		expect(
			formatError(
				new ApplyError({
					...base,
					restoreAttempted: true,
					restoreFailure: 'EIO',
				}),
			),
		).toBe(
			"failed to apply configuration 'work' to /t.json: disk full (restoring backup also failed: EIO)",
		);
	});

	it('should describe editor and argument failures', () => {
		expect(formatError(new EditorNotFoundError({searched: ['vim', 'nano']}))).toBe(
			'no editor found (tried vim, nano). Set $EDITOR or install a default editor',
		);
		expect(
			formatError(
				new ProcessError({
					command: 'vim',
					exitCode: 1,
					message: 'Editor exited with code 1',
				}),
			),
		).toBe('vim: Editor exited with code 1');
		expect(
			formatError(
				new ValidationError({
					field: 'apply',
					constraint: 'requires exactly one <name-or-id> argument',
					receivedValue: [],
				}),
			),
		).toBe('apply requires exactly one <name-or-id> argument');
	});
});
