import React from 'react';
import {render} from 'ink';
import {Effect} from 'effect';
import {SimpleConfirmation} from '../components/Confirmation.js';
import TextPrompt from '../components/TextPrompt.js';
import {ValidationError} from '../types/errors.js';
import type {EditorBridge, Output, Prompter} from '../commands/context.js';
import {openEditor, resolveEditor} from './editor.js';

/**
 * Mounts a prompt element and hands back a way to take it down again
 */
export type PromptMount = (node: React.ReactElement) => {unmount: () => void};

// Ctrl+C is delivered to the prompt as a cancel instead of exiting Ink
const mountOnTerminal: PromptMount = node => render(node, {exitOnCtrlC: false});

const stdinIsTty = (): boolean => Boolean(process.stdin.isTTY);

function requireTty(
	isInteractive: () => boolean,
): Effect.Effect<void, ValidationError> {
	return isInteractive()
		? Effect.void
		: Effect.fail(
				new ValidationError({
					field: 'stdin',
					constraint:
						'must be an interactive terminal to answer prompts (pass the values as flags or use --force)',
					receivedValue: false,
				}),
			);
}

/**
 * Prompter that renders each question with `mount` and resolves once the
 * user answers or cancels
 */
export function createInkPrompter(
	mount: PromptMount = mountOnTerminal,
	isInteractive: () => boolean = stdinIsTty,
): Prompter {
	return {
		confirm: message =>
			Effect.zipRight(
				requireTty(isInteractive),
				Effect.async<boolean>(resume => {
					const instance = mount(
						<SimpleConfirmation
							message={message}
							onConfirm={() => {
								instance.unmount();
								resume(Effect.succeed(true));
							}}
							onCancel={() => {
								instance.unmount();
								resume(Effect.succeed(false));
							}}
						/>,
					);
				}),
			),

		text: (message, options = {}) =>
			Effect.zipRight(
				requireTty(isInteractive),
				Effect.async<string | undefined>(resume => {
					const instance = mount(
						<TextPrompt
							message={message}
							initialValue={options.initialValue}
							placeholder={options.placeholder}
							onSubmit={value => {
								instance.unmount();
								resume(Effect.succeed(value.trim()));
							}}
							onCancel={() => {
								instance.unmount();
								resume(Effect.succeed(undefined));
							}}
						/>,
					);
				}),
			),
	};
}

/**
 * Prompts rendered with Ink on the controlling terminal
 */
export const inkPrompter: Prompter = createInkPrompter();

/**
 * Output written to the process streams; tables go through Ink
 */
export const consoleOutput: Output = {
	log: line => console.log(line),
	error: line => console.error(line),
	render: node => {
		const instance = render(node);
		instance.unmount();
	},
};

/**
 * The user's editor as resolved from the environment and PATH
 */
export const systemEditor: EditorBridge = {
	ensureAvailable: () => Effect.asVoid(resolveEditor()),
	open: filePath => openEditor(filePath),
};
