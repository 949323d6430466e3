import React from 'react';
import {Box, Text, useInput} from 'ink';
import SelectInput from 'ink-select-input';

export interface ConfirmationOption {
	label: string;
	value: string;
	color?: string;
}

interface ConfirmationProps {
	title?: React.ReactNode;
	message?: React.ReactNode;
	options: ConfirmationOption[];
	onSelect: (value: string) => void;
	initialIndex?: number;
	indicatorColor?: string;
	hint?: React.ReactNode;
	onCancel?: () => void;
}

/**
 * Select-list confirmation; Escape or Ctrl+C cancels when onCancel is given
 */
const Confirmation: React.FC<ConfirmationProps> = ({
	title,
	message,
	options,
	onSelect,
	initialIndex = 0,
	indicatorColor,
	hint,
	onCancel,
}) => {
	useInput((input, key) => {
		if (onCancel && (key.escape || (key.ctrl && input === 'c'))) {
			onCancel();
		}
	});

	return (
		<Box flexDirection="column">
			{title && <Box marginBottom={1}>{title}</Box>}

			{message && <Box>{message}</Box>}

			<Box marginTop={1}>
				<SelectInput
					items={options}
					onSelect={item => onSelect(item.value)}
					initialIndex={initialIndex}
					indicatorComponent={({isSelected}) => (
						<Text
							color={isSelected && indicatorColor ? indicatorColor : undefined}
						>
							{isSelected ? '>' : ' '}
						</Text>
					)}
					itemComponent={({isSelected, label}) => {
						const color = options.find(opt => opt.label === label)?.color;

						return (
							<Text
								color={
									isSelected && color ? color : isSelected ? undefined : 'white'
								}
								inverse={isSelected}
							>
								{' '}
								{label}{' '}
							</Text>
						);
					}}
				/>
			</Box>

			{hint && <Box marginTop={1}>{hint}</Box>}
		</Box>
	);
};

export default Confirmation;

interface SimpleConfirmationProps {
	message: string | React.ReactNode;
	onConfirm: () => void;
	onCancel: () => void;
	confirmText?: string;
	cancelText?: string;
	confirmColor?: string;
	cancelColor?: string;
	defaultConfirm?: boolean;
}

/**
 * Yes/No question. Defaults to No, like a (y/N) prompt.
 */
export const SimpleConfirmation: React.FC<SimpleConfirmationProps> = ({
	message,
	onConfirm,
	onCancel,
	confirmText = 'Yes',
	cancelText = 'No',
	confirmColor = 'green',
	cancelColor = 'red',
	defaultConfirm = false,
}) => {
	const options = [
		{label: confirmText, value: 'confirm', color: confirmColor},
		{label: cancelText, value: 'cancel', color: cancelColor},
	];

	const handleSelect = (value: string) => {
		if (value === 'confirm') {
			onConfirm();
		} else {
			onCancel();
		}
	};

	return (
		<Confirmation
			message={
				typeof message === 'string' ? <Text>{message}</Text> : message
			}
			options={options}
			onSelect={handleSelect}
			initialIndex={defaultConfirm ? 0 : 1}
			hint={
				<Text dimColor>Use ↑↓ to navigate, Enter to select, Esc to cancel</Text>
			}
			onCancel={onCancel}
		/>
	);
};
