import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {Either} from 'effect';
import os from 'os';
import path from 'path';
import {
	deriveRegistryPaths,
	expandPath,
	getDefaultRegistryDir,
	resolveRegistryPaths,
} from './defaultPaths.js';

describe('defaultPaths', () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = {...originalEnv};
		delete process.env['SETTINGS_SWITCH_HOME'];
		delete process.env['CLAUDE_CONFIG_DIR'];
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	describe('expandPath', () => {
		it('should expand a leading tilde', () => {
			expect(expandPath('~')).toBe(os.homedir());
			expect(expandPath('~/configs')).toBe(path.join(os.homedir(), 'configs'));
		});

		it('should resolve relative paths against the working directory', () => {
			expect(expandPath('settings.json')).toBe(
				path.resolve(process.cwd(), 'settings.json'),
			);
		});
	});

	describe('getDefaultRegistryDir', () => {
		it('should default to ~/.settings-switch', () => {
			expect(Either.getOrThrow(getDefaultRegistryDir())).toBe(
				path.join(os.homedir(), '.settings-switch'),
			);
		});

		it('should honour SETTINGS_SWITCH_HOME', () => {
			process.env['SETTINGS_SWITCH_HOME'] = '/srv/registry';

			expect(Either.getOrThrow(getDefaultRegistryDir())).toBe('/srv/registry');
		});
	});

	describe('resolveRegistryPaths', () => {
		it('should prefer explicit overrides', () => {
			process.env['SETTINGS_SWITCH_HOME'] = '/srv/registry';
			process.env['CLAUDE_CONFIG_DIR'] = '/etc/claude';

			const result = resolveRegistryPaths({
				root: '/tmp/root',
				target: '/tmp/target/settings.json',
			});

			expect(Either.getOrThrow(result)).toEqual({
				rootDir: '/tmp/root',
				targetPath: '/tmp/target/settings.json',
			});
		});

		it('should fall back to the environment', () => {
			process.env['SETTINGS_SWITCH_HOME'] = '/srv/registry';
			process.env['CLAUDE_CONFIG_DIR'] = '/etc/claude';

			expect(Either.getOrThrow(resolveRegistryPaths({}))).toEqual({
				rootDir: '/srv/registry',
				targetPath: '/etc/claude/settings.json',
			});
		});
	});

	describe('deriveRegistryPaths', () => {
		it('should lay out the registry under the root', () => {
			expect(
				deriveRegistryPaths({
					rootDir: '/data/reg',
					targetPath: '/home/u/.claude/settings.json',
				}),
			).toEqual({
				rootDir: '/data/reg',
				targetPath: '/home/u/.claude/settings.json',
				configsDir: '/data/reg/configs',
				metadataPath: '/data/reg/config.json',
				backupPath: '/home/u/.claude/settings.json.backup',
			});
		});
	});
});
