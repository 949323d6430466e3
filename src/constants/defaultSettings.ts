/**
 * Seed for the editor when there is no settings file to start from
 */
export const DEFAULT_SETTINGS = {
	theme: 'dark',
	fontSize: 14,
	editorSettings: {
		tabSize: 2,
		wordWrap: true,
	},
} as const;

export const DEFAULT_SETTINGS_CONTENT = `${JSON.stringify(DEFAULT_SETTINGS, null, 2)}\n`;
