import React, {useRef, useState} from 'react';
import {Box, Text, useInput} from 'ink';
import stripAnsi from 'strip-ansi';

interface TextPromptProps {
	message: string;
	onSubmit: (value: string) => void;
	onCancel?: () => void;
	initialValue?: string;
	placeholder?: string;
}

// bracketed-paste markers some terminals wrap pasted text in
const cleanInput = (input: string): string =>
	stripAnsi(input).replace(/\[200~/g, '').replace(/\[201~/g, '');

/**
 * Single-line text question. Enter submits, Escape or Ctrl+C cancels.
 */
const TextPrompt: React.FC<TextPromptProps> = ({
	message,
	onSubmit,
	onCancel,
	initialValue = '',
	placeholder = '',
}) => {
	// refs keep fast successive keystrokes from reading a stale value
	const valueRef = useRef(initialValue);
	const [value, setValue] = useState(initialValue);

	const update = (next: string) => {
		valueRef.current = next;
		setValue(next);
	};

	useInput((input, key) => {
		if (key.return) {
			onSubmit(valueRef.current);
			return;
		}
		if (key.escape || (key.ctrl && input === 'c')) {
			onCancel?.();
			return;
		}
		if (key.backspace || key.delete) {
			update(valueRef.current.slice(0, -1));
			return;
		}
		if (key.upArrow || key.downArrow || key.leftArrow || key.rightArrow) {
			return;
		}
		if (key.tab) {
			return;
		}

		const cleaned = cleanInput(input);
		if (cleaned) {
			update(valueRef.current + cleaned);
		}
	});

	return (
		<Box>
			<Text bold>{message} </Text>
			{value.length > 0 ? (
				<Text>
					{value}
					<Text inverse> </Text>
				</Text>
			) : (
				<Text>
					<Text inverse>{placeholder[0] ?? ' '}</Text>
					<Text dimColor>{placeholder.slice(1)}</Text>
				</Text>
			)}
		</Box>
	);
};

export default TextPrompt;
