import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {existsSync, mkdirSync, readFileSync, writeFileSync} from 'fs';
import path from 'path';
import {applyCommand} from './apply.js';
import type {CommandContext} from './context.js';
import {openRegistry, type ConfigRegistry} from '../services/configRegistry.js';
import type {ApplyFlags, ConfigurationRecord} from '../types/index.js';
import {
	expectEffectFailure,
	expectEffectSuccess,
	fakeEditor,
	makeTempDir,
	recordingOutput,
	scriptedPrompter,
	type RecordingOutput,
	type ScriptedPrompter,
} from '../utils/testHelpers.js';

const flags = (overrides: Partial<ApplyFlags> = {}): ApplyFlags => ({
	confirm: false,
	force: false,
	dryRun: false,
	...overrides,
});

describe('applyCommand', () => {
	let dir: string;
	let cleanup: () => void;
	let registry: ConfigRegistry;
	let targetPath: string;
	let output: RecordingOutput;
	let work: ConfigurationRecord;

	const context = (
		prompter: ScriptedPrompter = scriptedPrompter({}),
	): CommandContext => ({registry, output, prompter, editor: fakeEditor([])});

	beforeEach(() => {
		({dir, cleanup} = makeTempDir());
		mkdirSync(path.join(dir, 'claude'));
		targetPath = path.join(dir, 'claude', 'settings.json');
		registry = expectEffectSuccess(
			openRegistry({rootDir: path.join(dir, 'registry'), targetPath}),
		);
		work = expectEffectSuccess(
			registry.add({content: '{"theme":"dark"}'}, 'work', 'Work laptop'),
		);
		output = recordingOutput();
	});

	afterEach(() => {
		cleanup();
	});

	it('should apply and mention the backup', () => {
		writeFileSync(targetPath, '{"theme":"light"}');

		expectEffectSuccess(applyCommand(context(), 'work', flags()));

		expect(readFileSync(targetPath, 'utf-8')).toBe('{"theme":"dark"}');
		expect(output.lines).toContain('✅ Configuration applied successfully!');
		expect(output.lines).toContain(`💾 Backup saved: ${targetPath}.backup`);
		expect(output.lines).toContain(
			`💡 To rollback: mv "${targetPath}.backup" "${targetPath}"`,
		);
	});

	it('should not mention a backup when there was no target', () => {
		expectEffectSuccess(applyCommand(context(), work.id, flags()));

		expect(output.lines).toContain('   Current: no existing settings file found');
		expect(output.lines.some(line => line.startsWith('💾'))).toBe(false);
	});

	it('should only describe the actions on a dry run', () => {
		writeFileSync(targetPath, '{"theme":"light"}');

		expectEffectSuccess(applyCommand(context(), 'work', flags({dryRun: true})));

		expect(readFileSync(targetPath, 'utf-8')).toBe('{"theme":"light"}');
		expect(existsSync(`${targetPath}.backup`)).toBe(false);
		expect(output.lines.slice(-3)).toEqual([
			'🔍 DRY RUN MODE - No changes will be made',
			`Would create backup: ${targetPath}.backup`,
			`Would copy: ${work.file_path} -> ${targetPath}`,
		]);
	});

	it('should skip the backup line on a dry run without a target', () => {
		expectEffectSuccess(applyCommand(context(), 'work', flags({dryRun: true})));

		expect(output.lines.slice(-2)).toEqual([
			'🔍 DRY RUN MODE - No changes will be made',
			`Would copy: ${work.file_path} -> ${targetPath}`,
		]);
		expect(existsSync(targetPath)).toBe(false);
	});

	it('should ask before replacing when --confirm is given', () => {
		writeFileSync(targetPath, '{"theme":"light"}');
		const prompter = scriptedPrompter({confirm: [false]});

		expectEffectSuccess(applyCommand(context(prompter), 'work', flags({confirm: true})));

		expect(prompter.asked).toEqual([
			'This will replace your current settings. Continue?',
		]);
		expect(output.lines).toContain('❌ Operation cancelled');
		expect(readFileSync(targetPath, 'utf-8')).toBe('{"theme":"light"}');
	});

	it('should word the question differently when there is no target', () => {
		const prompter = scriptedPrompter({confirm: [true]});

		expectEffectSuccess(applyCommand(context(prompter), 'work', flags({confirm: true})));

		expect(prompter.asked).toEqual(['No existing settings file found. Continue?']);
		expect(readFileSync(targetPath, 'utf-8')).toBe('{"theme":"dark"}');
	});

	it('should not ask with --force', () => {
		const prompter = scriptedPrompter({});

		expectEffectSuccess(
			applyCommand(context(prompter), 'work', flags({confirm: true, force: true})),
		);

		expect(prompter.asked).toEqual([]);
		expect(existsSync(targetPath)).toBe(true);
	});

	it('should fail for an unknown configuration', () => {
		const error = expectEffectFailure(applyCommand(context(), 'ghost', flags()));

		expect(error).toMatchObject({_tag: 'NotFoundError', identifier: 'ghost'});
	});

	it('should fail when the stored content is invalid', () => {
		writeFileSync(work.file_path, 'nope');

		const error = expectEffectFailure(applyCommand(context(), 'work', flags()));

		expect(error._tag).toBe('InvalidJsonError');
		expect(existsSync(targetPath)).toBe(false);
	});
});
