import os from 'os';
import path from 'path';
import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		watch: false,
		pool: 'threads',
		environment: 'node',
		include: ['src/**/*.test.{ts,tsx}'],
		env: {
			SETTINGS_SWITCH_LOG_FILE: path.join(
				os.tmpdir(),
				'settings-switch-test.log',
			),
		},
		coverage: {
			reporter: ['text', 'json', 'html'],
			exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*'],
		},
	},
});
