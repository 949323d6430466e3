import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {Either} from 'effect';
import os from 'os';
import path from 'path';
import {getClaudeDir, getClaudeSettingsPath} from './claudeDir.js';

describe('claudeDir', () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = {...originalEnv};
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	describe('getClaudeDir', () => {
		it('should return Either.right with CLAUDE_CONFIG_DIR when set', () => {
			process.env['CLAUDE_CONFIG_DIR'] = '/custom/claude';

			const result = getClaudeDir();

			expect(Either.isRight(result)).toBe(true);
			if (Either.isRight(result)) {
				expect(result.right).toBe('/custom/claude');
			}
		});

		it('should trim whitespace from CLAUDE_CONFIG_DIR', () => {
			process.env['CLAUDE_CONFIG_DIR'] = '  /custom/claude  ';

			const result = getClaudeDir();

			expect(Either.getOrThrow(result)).toBe('/custom/claude');
		});

		it('should ignore a blank CLAUDE_CONFIG_DIR', () => {
			process.env['CLAUDE_CONFIG_DIR'] = '   ';

			const result = getClaudeDir();

			expect(Either.getOrThrow(result)).toBe(path.join(os.homedir(), '.claude'));
		});

		it('should default to ~/.claude when env var not set', () => {
			delete process.env['CLAUDE_CONFIG_DIR'];

			const result = getClaudeDir();

			expect(Either.getOrThrow(result)).toBe(path.join(os.homedir(), '.claude'));
		});
	});

	describe('getClaudeSettingsPath', () => {
		it('should point at settings.json inside the Claude directory', () => {
			process.env['CLAUDE_CONFIG_DIR'] = '/custom/claude';

			const result = getClaudeSettingsPath();

			expect(Either.getOrThrow(result)).toBe('/custom/claude/settings.json');
		});
	});
});
