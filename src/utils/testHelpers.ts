/**
 * Helpers for asserting on Effect and Either results in tests.
 *
 * Registry and storage operations are synchronous underneath, so their
 * Effects can be run with `Effect.runSync`.
 *
 * @example
 * ```typescript
 * const record = expectEffectSuccess(registry.add({content: '{}'}, 'base'));
 * const error = expectEffectFailure(registry.add({content: '{}'}, 'base'));
 * expect(error._tag).toBe('DuplicateNameError');
 * ```
 *
 * @module testHelpers
 */

import {mkdtempSync, rmSync, writeFileSync} from 'fs';
import os from 'os';
import path from 'path';
import type React from 'react';
import {Cause, Effect, Either, Exit, Option} from 'effect';
import type {
	EditorBridge,
	Output,
	Prompter,
} from '../commands/context.js';
import {EditorNotFoundError, ProcessError} from '../types/errors.js';

/**
 * Assert that an Effect succeeds and return the success value
 */
export function expectEffectSuccess<A, E>(
	effect: Effect.Effect<A, E, never>,
): A {
	const exit = Effect.runSync(Effect.exit(effect));
	if (Exit.isFailure(exit)) {
		throw new Error(
			`Expected Effect to succeed, but it failed with: ${Cause.pretty(exit.cause)}`,
		);
	}
	return exit.value;
}

/**
 * Assert that an Effect fails with an expected error and return it
 */
export function expectEffectFailure<A, E>(
	effect: Effect.Effect<A, E, never>,
): E {
	const exit = Effect.runSync(Effect.exit(effect));
	if (Exit.isSuccess(exit)) {
		throw new Error(
			`Expected Effect to fail, but it succeeded with: ${JSON.stringify(exit.value)}`,
		);
	}
	const failure = Cause.failureOption(exit.cause);
	if (Option.isNone(failure)) {
		throw new Error(`Expected a failure, got: ${Cause.pretty(exit.cause)}`);
	}
	return failure.value;
}

export function expectEitherRight<A, E>(either: Either.Either<A, E>): A {
	if (Either.isLeft(either)) {
		throw new Error(
			`Expected Either to be Right, but it was Left with: ${JSON.stringify(either.left)}`,
		);
	}
	return either.right;
}

export function expectEitherLeft<A, E>(either: Either.Either<A, E>): E {
	if (Either.isRight(either)) {
		throw new Error(
			`Expected Either to be Left, but it was Right with: ${JSON.stringify(either.right)}`,
		);
	}
	return either.left;
}

/**
 * Create a scratch directory; call the returned function to delete it
 */
export function makeTempDir(prefix = 'settings-switch-test-'): {
	dir: string;
	cleanup: () => void;
} {
	const dir = mkdtempSync(path.join(os.tmpdir(), prefix));
	return {
		dir,
		cleanup: () => rmSync(dir, {recursive: true, force: true}),
	};
}

export interface RecordingOutput extends Output {
	lines: string[];
	errors: string[];
	rendered: React.ReactElement[];
}

/**
 * Output that keeps everything written to it
 */
export function recordingOutput(): RecordingOutput {
	const lines: string[] = [];
	const errors: string[] = [];
	const rendered: React.ReactElement[] = [];
	return {
		lines,
		errors,
		rendered,
		log: line => lines.push(line),
		error: line => errors.push(line),
		render: node => rendered.push(node),
	};
}

export interface ScriptedPrompter extends Prompter {
	asked: string[];
}

/**
 * Prompter answering from fixed lists, in order. Running out of answers
 * declines confirmations and cancels text prompts.
 */
export function scriptedPrompter(answers: {
	confirm?: boolean[];
	text?: Array<string | undefined>;
}): ScriptedPrompter {
	const confirms = [...(answers.confirm ?? [])];
	const texts = [...(answers.text ?? [])];
	const asked: string[] = [];
	return {
		asked,
		confirm: message =>
			Effect.sync(() => {
				asked.push(message);
				return confirms.shift() ?? false;
			}),
		text: message =>
			Effect.sync(() => {
				asked.push(message);
				return texts.shift();
			}),
	};
}

export interface FakeEditor extends EditorBridge {
	opened: string[];
}

/**
 * Editor that writes the next scripted content into the file it is asked to
 * open. `available: false` behaves like a machine with no editor installed.
 */
export function fakeEditor(
	contents: string[],
	options: {available?: boolean; exitCode?: number} = {},
): FakeEditor {
	const queue = [...contents];
	const opened: string[] = [];
	const missing = new EditorNotFoundError({searched: ['vim']});
	const available = options.available ?? true;

	return {
		opened,
		ensureAvailable: () => (available ? Effect.void : Effect.fail(missing)),
		open: filePath =>
			Effect.gen(function* () {
				if (!available) {
					return yield* Effect.fail(missing);
				}
				opened.push(filePath);
				if (options.exitCode !== undefined && options.exitCode !== 0) {
					return yield* Effect.fail(
						new ProcessError({
							command: 'vim',
							exitCode: options.exitCode,
							message: `Editor exited with code ${options.exitCode}`,
						}),
					);
				}
				const next = queue.shift();
				if (next !== undefined) {
					writeFileSync(filePath, next);
				}
			}),
	};
}
