import path from 'path';
import os from 'os';
import {Either} from 'effect';
import {ValidationError} from '../types/errors.js';
import type {RegistryPaths, ResolvedRegistryPaths} from '../types/index.js';
import {getClaudeSettingsPath} from './claudeDir.js';

export const BACKUP_SUFFIX = '.backup';
export const METADATA_FILE_NAME = 'config.json';
export const CONFIGS_DIR_NAME = 'configs';

/**
 * Expand a leading ~/ and resolve to an absolute path
 */
export function expandPath(input: string): string {
	const trimmed = input.trim();
	if (trimmed === '~') {
		return os.homedir();
	}
	if (trimmed.startsWith('~/')) {
		return path.join(os.homedir(), trimmed.slice(2));
	}
	return path.resolve(trimmed);
}

/**
 * Get the default registry directory.
 * SETTINGS_SWITCH_HOME overrides ~/.settings-switch.
 */
export function getDefaultRegistryDir(): Either.Either<
	string,
	ValidationError
> {
	const envHome = process.env['SETTINGS_SWITCH_HOME'];
	if (envHome && envHome.trim()) {
		return Either.right(expandPath(envHome));
	}

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
	return Either.right(path.join(homeDir, '.settings-switch'));
}

/**
 * Resolve registry locations from command-line overrides, falling back to the
 * environment and platform defaults
 */
export function resolveRegistryPaths(overrides: {
	root?: string;
	target?: string;
}): Either.Either<RegistryPaths, ValidationError> {
	const rootDir = overrides.root
		? Either.right(expandPath(overrides.root))
		: getDefaultRegistryDir();
	const targetPath = overrides.target
		? Either.right(expandPath(overrides.target))
		: getClaudeSettingsPath();

	return Either.all({rootDir, targetPath});
}

/**
 * Derive the storage layout from the injected root and target
 */
export function deriveRegistryPaths(
	paths: RegistryPaths,
): ResolvedRegistryPaths {
	return {
		rootDir: paths.rootDir,
		targetPath: paths.targetPath,
		configsDir: path.join(paths.rootDir, CONFIGS_DIR_NAME),
		metadataPath: path.join(paths.rootDir, METADATA_FILE_NAME),
		backupPath: `${paths.targetPath}${BACKUP_SUFFIX}`,
	};
}
