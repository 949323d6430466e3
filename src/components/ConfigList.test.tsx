import {describe, it, expect} from 'vitest';
import React from 'react';
import {render} from 'ink-testing-library';
import stripAnsi from 'strip-ansi';
import ConfigList, {toCells, type ConfigListRow} from './ConfigList.js';
import type {ConfigurationRecord} from '../types/index.js';
import {formatTimestamp} from '../utils/format.js';

const created = new Date(2024, 2, 1, 14, 30).toISOString();

const record = (overrides: Partial<ConfigurationRecord>): ConfigurationRecord => ({
	id: '123e4567-e89b-12d3-a456-426614174000',
	name: 'work',
	description: '',
	created_at: created,
	file_path: '/registry/configs/123e4567-e89b-12d3-a456-426614174000.json',
	...overrides,
});

describe('toCells', () => {
	it('should shorten the id and mark an empty description', () => {
		const row: ConfigListRow = {record: record({}), size: 2048, active: false};

		expect(toCells(row, false)).toEqual([
			'123e4567...',
			'work',
			'-',
			'2024-03-01 14:30',
			'2.0 KB',
		]);
	});

	it('should truncate long descriptions unless detailed', () => {
		const description = 'x'.repeat(45);
		const row: ConfigListRow = {
			record: record({description}),
			size: undefined,
			active: false,
		};

		expect(toCells(row, false)[2]).toBe(`${'x'.repeat(37)}...`);
		expect(toCells(row, true)[2]).toBe(description);
		expect(toCells(row, true)[0]).toBe('123e4567-e89b-12d3-a456-426614174000');
		expect(toCells(row, true)[4]).toBe('unknown');
	});
});

describe('ConfigList', () => {
	it('should render a header and one line per record', () => {
		const rows: ConfigListRow[] = [
			{record: record({}), size: 120, active: true},
			{
				record: record({id: 'fedcba98-0000-0000-0000-000000000000', name: 'home'}),
				size: 20,
				active: false,
			},
		];

		const {lastFrame} = render(<ConfigList rows={rows} detailed={false} />);
		const lines = stripAnsi(lastFrame() ?? '').split('\n');

		expect(lines).toHaveLength(3);
		expect(lines[0]).toMatch(/^\s+ID\s+Name\s+Description\s+Created\s+Size/);
		expect(lines[1]).toMatch(/^\* 123e4567\.\.\.\s+work\s+-\s+/);
		expect(lines[1]).toContain(formatTimestamp(created));
		expect(lines[1]).toContain('120 B');
		expect(lines[2]).toMatch(/^\s+fedcba98\.\.\.\s+home\s+/);
		expect(lines[2]).toContain('20 B');
	});

	it('should show full ids when detailed', () => {
		const rows: ConfigListRow[] = [{record: record({}), size: 2, active: false}];

		const {lastFrame} = render(<ConfigList rows={rows} detailed />);

		expect(lastFrame()).toContain('123e4567-e89b-12d3-a456-426614174000');
	});
});
