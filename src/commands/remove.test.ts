import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {existsSync, mkdirSync} from 'fs';
import path from 'path';
import {removeCommand} from './remove.js';
import type {CommandContext} from './context.js';
import {openRegistry, type ConfigRegistry} from '../services/configRegistry.js';
import type {ConfigurationRecord} from '../types/index.js';
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

describe('removeCommand', () => {
	let dir: string;
	let cleanup: () => void;
	let registry: ConfigRegistry;
	let output: RecordingOutput;
	let work: ConfigurationRecord;

	const context = (
		prompter: ScriptedPrompter = scriptedPrompter({}),
	): CommandContext => ({registry, output, prompter, editor: fakeEditor([])});

	beforeEach(() => {
		({dir, cleanup} = makeTempDir());
		mkdirSync(path.join(dir, 'claude'));
		registry = expectEffectSuccess(
			openRegistry({
				rootDir: path.join(dir, 'registry'),
				targetPath: path.join(dir, 'claude', 'settings.json'),
			}),
		);
		work = expectEffectSuccess(registry.add({content: '{}'}, 'work'));
		output = recordingOutput();
	});

	afterEach(() => {
		cleanup();
	});

	it('should remove without asking when forced', () => {
		const prompter = scriptedPrompter({});

		expectEffectSuccess(
			removeCommand(context(prompter), 'work', {force: true, dryRun: false}),
		);

		expect(prompter.asked).toEqual([]);
		expect(registry.list()).toEqual([]);
		expect(existsSync(work.file_path)).toBe(false);
		expect(output.lines).toContain("✅ Configuration 'work' removed successfully!");
		expect(output.lines).toContain('📋 No configurations remaining');
	});

	it('should require both confirmations', () => {
		const prompter = scriptedPrompter({confirm: [true], text: ['work']});

		expectEffectSuccess(
			removeCommand(context(prompter), work.id, {force: false, dryRun: false}),
		);

		expect(prompter.asked).toEqual([
			"Are you sure you want to remove 'work'?",
			'Type the configuration name to confirm:',
		]);
		expect(registry.list()).toEqual([]);
	});

	it('should cancel when the first question is declined', () => {
		const prompter = scriptedPrompter({confirm: [false]});

		expectEffectSuccess(
			removeCommand(context(prompter), 'work', {force: false, dryRun: false}),
		);

		expect(prompter.asked).toHaveLength(1);
		expect(output.lines).toContain('❌ Operation cancelled');
		expect(registry.list()).toEqual([work]);
	});

	it('should cancel when the typed name does not match', () => {
		const prompter = scriptedPrompter({confirm: [true], text: ['Work']});

		expectEffectSuccess(
			removeCommand(context(prompter), 'work', {force: false, dryRun: false}),
		);

		expect(output.lines).toContain(
			'❌ Configuration name did not match. Operation cancelled',
		);
		expect(registry.list()).toEqual([work]);
		expect(existsSync(work.file_path)).toBe(true);
	});

	it('should only describe the actions on a dry run', () => {
		expectEffectSuccess(
			removeCommand(context(), 'work', {force: false, dryRun: true}),
		);

		expect(output.lines.slice(-3)).toEqual([
			'🔍 DRY RUN MODE - No changes will be made',
			`Would remove file: ${work.file_path}`,
			'Would remove from configuration list: work',
		]);
		expect(registry.list()).toEqual([work]);
		expect(existsSync(work.file_path)).toBe(true);
	});

	it('should report how many configurations remain', () => {
		expectEffectSuccess(registry.add({content: '{}'}, 'home'));
		expectEffectSuccess(registry.add({content: '{}'}, 'base'));

		expectEffectSuccess(
			removeCommand(context(), 'work', {force: true, dryRun: false}),
		);

		expect(output.lines).toContain('📋 2 configurations remaining');
	});

	it('should fail for an unknown configuration', () => {
		const error = expectEffectFailure(
			removeCommand(context(), 'ghost', {force: true, dryRun: false}),
		);

		expect(error._tag).toBe('NotFoundError');
	});
});
