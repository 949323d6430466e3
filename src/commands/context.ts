import {existsSync} from 'fs';
import path from 'path';
import type React from 'react';
import {Effect} from 'effect';
import type {ConfigRegistry} from '../services/configRegistry.js';
import {
	EditorNotFoundError,
	ProcessError,
	ValidationError,
} from '../types/errors.js';
import type {ResolvedRegistryPaths} from '../types/index.js';

export interface Output {
	log(line: string): void;
	error(line: string): void;
	render(node: React.ReactElement): void;
}

export interface TextPromptOptions {
	initialValue?: string;
	placeholder?: string;
}

/**
 * Interactive questions. `text` yields undefined when the user cancels.
 */
export interface Prompter {
	confirm(message: string): Effect.Effect<boolean, ValidationError>;
	text(
		message: string,
		options?: TextPromptOptions,
	): Effect.Effect<string | undefined, ValidationError>;
}

export interface EditorBridge {
	ensureAvailable(): Effect.Effect<void, EditorNotFoundError>;
	open(
		filePath: string,
	): Effect.Effect<void, EditorNotFoundError | ProcessError>;
}

export interface CommandContext {
	registry: ConfigRegistry;
	output: Output;
	prompter: Prompter;
	editor: EditorBridge;
}

/**
 * The target's directory must exist: it belongs to the application whose
 * settings are being switched, so its absence means that application is not
 * installed (or --target points somewhere wrong).
 */
export function checkPrerequisites(
	paths: ResolvedRegistryPaths,
): Effect.Effect<void, ValidationError> {
	const targetDir = path.dirname(paths.targetPath);
	return existsSync(targetDir)
		? Effect.void
		: Effect.fail(
				new ValidationError({
					field: 'target directory',
					constraint: `not found at ${targetDir}; install the application first or pass --target`,
					receivedValue: targetDir,
				}),
			);
}
