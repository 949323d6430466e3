import {spawn} from 'child_process';
import {accessSync, constants, statSync} from 'fs';
import path from 'path';
import {Effect, Either} from 'effect';
import {EditorNotFoundError, ProcessError} from '../types/errors.js';

/**
 * Editors tried, in order, when neither $VISUAL nor $EDITOR is set
 */
export const EDITOR_FALLBACKS: Readonly<
	Record<'win32' | 'darwin' | 'default', readonly string[]>
> = {
	win32: ['code', 'notepad++', 'notepad'],
	darwin: ['code', 'vim', 'nano', 'emacs'],
	default: ['code', 'vim', 'nano', 'emacs', 'gedit'],
};

export interface EditorCommand {
	command: string;
	args: string[];
}

export interface EditorLookup {
	env: NodeJS.ProcessEnv;
	platform: NodeJS.Platform;
	isExecutable: (name: string) => boolean;
}

function fallbacksFor(platform: NodeJS.Platform): readonly string[] {
	if (platform === 'win32') return EDITOR_FALLBACKS.win32;
	if (platform === 'darwin') return EDITOR_FALLBACKS.darwin;
	return EDITOR_FALLBACKS.default;
}

function isRunnableFile(candidate: string, platform: NodeJS.Platform): boolean {
	try {
		if (!statSync(candidate).isFile()) {
			return false;
		}
		if (platform !== 'win32') {
			accessSync(candidate, constants.X_OK);
		}
		return true;
	} catch {
		return false;
	}
}

/**
 * Search PATH for an executable, honouring PATHEXT on Windows
 */
export function findExecutable(
	name: string,
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
): boolean {
	if (name.includes('/') || name.includes('\\')) {
		return isRunnableFile(name, platform);
	}

	const delimiter = platform === 'win32' ? ';' : ':';
	const dirs = (env['PATH'] ?? env['Path'] ?? '')
		.split(delimiter)
		.filter(Boolean);
	const extensions =
		platform === 'win32'
			? ['', ...(env['PATHEXT'] ?? '.EXE;.CMD;.BAT;.COM').split(';')]
			: [''];

	return dirs.some(dir =>
		extensions.some(ext =>
			isRunnableFile(path.join(dir, name + ext), platform),
		),
	);
}

export function defaultEditorLookup(): EditorLookup {
	return {
		env: process.env,
		platform: process.platform,
		isExecutable: name => findExecutable(name),
	};
}

/**
 * Work out which editor to launch.
 * An explicit preference ($VISUAL, then $EDITOR) is used as given and may
 * carry arguments, e.g. `code --wait`.
 */
export function resolveEditor(
	lookup: EditorLookup = defaultEditorLookup(),
): Either.Either<EditorCommand, EditorNotFoundError> {
	const preference = [lookup.env['VISUAL'], lookup.env['EDITOR']].find(
		value => value !== undefined && value.trim() !== '',
	);
	if (preference) {
		const [command = '', ...args] = preference.trim().split(/\s+/);
		return Either.right({command, args});
	}

	const candidates = fallbacksFor(lookup.platform);
	const found = candidates.find(candidate => lookup.isExecutable(candidate));
	return found
		? Either.right({command: found, args: []})
		: Either.left(new EditorNotFoundError({searched: candidates}));
}

export function isEditorAvailable(
	lookup: EditorLookup = defaultEditorLookup(),
): boolean {
	return Either.isRight(resolveEditor(lookup));
}

/**
 * Open a file in the user's editor and wait for it to exit.
 * A non-zero exit or a signal is a ProcessError.
 */
export function openEditor(
	filePath: string,
	lookup: EditorLookup = defaultEditorLookup(),
): Effect.Effect<void, EditorNotFoundError | ProcessError> {
	return Effect.flatMap(resolveEditor(lookup), editor =>
		Effect.async<void, ProcessError>(resume => {
			const child = spawn(editor.command, [...editor.args, filePath], {
				stdio: 'inherit',
				env: lookup.env,
				shell: lookup.platform === 'win32',
			});

			child.on('exit', (code, signal) => {
				if (code !== 0 || signal) {
					resume(
						Effect.fail(
							new ProcessError({
								command: editor.command,
								exitCode: code ?? undefined,
								signal: signal ?? undefined,
								message: signal
									? `Editor terminated by signal ${signal}`
									: `Editor exited with code ${code}`,
							}),
						),
					);
					return;
				}
				resume(Effect.void);
			});

			child.on('error', error => {
				resume(
					Effect.fail(
						new ProcessError({
							command: editor.command,
							message: error.message,
						}),
					),
				);
			});
		}),
	);
}
