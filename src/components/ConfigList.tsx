import React from 'react';
import {Box, Text} from 'ink';
import type {ConfigurationRecord} from '../types/index.js';
import {
	formatFileSize,
	formatTimestamp,
	shortId,
	truncate,
} from '../utils/format.js';

export interface ConfigListRow {
	record: ConfigurationRecord;
	size: number | undefined;
	active: boolean;
}

interface ConfigListProps {
	rows: ConfigListRow[];
	detailed: boolean;
}

const HEADERS = ['ID', 'Name', 'Description', 'Created', 'Size'] as const;
const COLUMN_GAP = 2;

export function toCells(row: ConfigListRow, detailed: boolean): string[] {
	const {record} = row;
	const description =
		record.description === ''
			? '-'
			: detailed
				? record.description
				: truncate(record.description, 40);

	return [
		detailed ? record.id : shortId(record.id),
		record.name,
		description,
		formatTimestamp(record.created_at),
		formatFileSize(row.size),
	];
}

/**
 * Table of stored configurations. Rows matching the target file are marked
 * with a green `*`.
 */
const ConfigList: React.FC<ConfigListProps> = ({rows, detailed}) => {
	const cells = rows.map(row => toCells(row, detailed));
	const widths = HEADERS.map((header, column) =>
		Math.max(header.length, ...cells.map(line => line[column]?.length ?? 0)),
	);

	return (
		<Box flexDirection="column">
			<Box>
				<Box width={2} />
				{HEADERS.map((header, column) => (
					<Box key={header} width={(widths[column] ?? 0) + COLUMN_GAP}>
						<Text bold>{header}</Text>
					</Box>
				))}
			</Box>
			{rows.map((row, index) => (
				<Box key={row.record.id}>
					<Box width={2}>
						<Text color="green">{row.active ? '*' : ' '}</Text>
					</Box>
					{(cells[index] ?? []).map((cell, column) => (
						<Box
							key={HEADERS[column]}
							width={(widths[column] ?? 0) + COLUMN_GAP}
						>
							<Text
								dimColor={column === 0}
								color={row.active ? 'green' : undefined}
							>
								{cell}
							</Text>
						</Box>
					))}
				</Box>
			))}
		</Box>
	);
};

export default ConfigList;
