/**
 * @fileoverview Location of the Claude Code settings file, which is the default
 * target the registry applies configurations to. Respects CLAUDE_CONFIG_DIR.
 */

import path from 'path';
import os from 'os';
import {Either} from 'effect';
import {ValidationError} from '../types/errors.js';

export const SETTINGS_FILE_NAME = 'settings.json';

/**
 * Get the Claude directory path using Either for synchronous validation
 * Returns Either with ValidationError if HOME directory cannot be determined
 */
export function getClaudeDir(): Either.Either<string, ValidationError> {
	const envConfigDir = process.env['CLAUDE_CONFIG_DIR'];
	if (envConfigDir && envConfigDir.trim()) {
		return Either.right(envConfigDir.trim());
	}

	try {
		const homeDir = os.homedir();
		if (!homeDir) {
			return Either.left(
				new ValidationError({
					field: 'HOME',
					constraint: 'must be set',
					receivedValue: undefined,
				}),
			);
		}
		return Either.right(path.join(homeDir, '.claude'));
	} catch {
		return Either.left(
			new ValidationError({
				field: 'HOME',
				constraint: 'must be accessible',
				receivedValue: undefined,
			}),
		);
	}
}

/**
 * Path of the settings file the registry applies configurations to
 */
export function getClaudeSettingsPath(): Either.Either<
	string,
	ValidationError
> {
	return Either.map(getClaudeDir(), dir => path.join(dir, SETTINGS_FILE_NAME));
}
