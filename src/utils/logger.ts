import * as fs from 'fs';
import * as path from 'path';
import {format} from 'util';
import os from 'os';

/**
 * Logger configuration with size management and log rotation
 */
export interface LoggerConfig {
	/** Maximum log file size in bytes (default: 5MB) */
	maxSizeBytes: number;
	/** Number of old logs to keep (default: 3) */
	maxRotatedFiles: number;
	/** Echo errors to the console as well (default: false, the CLI prints its own) */
	logErrorsToConsole: boolean;
	/** Explicit log file location, bypassing environment resolution */
	logFile?: string;
}

export enum LogLevel {
	DEBUG = 'DEBUG',
	INFO = 'INFO',
	WARN = 'WARN',
	ERROR = 'ERROR',
	LOG = 'LOG',
}

const APP_DIR = 'settings-switch';
const LOG_FILE_NAME = 'settings-switch.log';

/**
 * Resolve the log file path following the XDG Base Directory layout.
 * SETTINGS_SWITCH_LOG_FILE overrides everything (used by the tests).
 */
export function resolveLogPath(
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
): string {
	const override = env['SETTINGS_SWITCH_LOG_FILE'];
	if (override) {
		return override;
	}

	const xdgStateHome = env['XDG_STATE_HOME'];
	if (xdgStateHome) {
		return path.join(xdgStateHome, APP_DIR, LOG_FILE_NAME);
	}

	const homeDir = os.homedir();
	if (platform === 'darwin') {
		return path.join(homeDir, 'Library', 'Logs', APP_DIR, LOG_FILE_NAME);
	}

	return path.join(homeDir, '.local', 'state', APP_DIR, LOG_FILE_NAME);
}

/**
 * File logger for the CLI.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] [INFO] message`. The file is
 * rotated once it grows past `maxSizeBytes`. Failing to log never fails the
 * command that is logging.
 */
export class Logger {
	private readonly logFile: string;
	private readonly config: LoggerConfig;
	private writeQueue: Array<() => void> = [];
	private isWriting = false;

	constructor(config: Partial<LoggerConfig> = {}) {
		this.config = {
			maxSizeBytes: config.maxSizeBytes ?? 5 * 1024 * 1024,
			maxRotatedFiles: config.maxRotatedFiles ?? 3,
			logErrorsToConsole: config.logErrorsToConsole ?? false,
		};

		this.logFile = config.logFile ?? resolveLogPath();
		this.initializeLogFile();
	}

	private initializeLogFile(): void {
		try {
			const logDir = path.dirname(this.logFile);
			if (!fs.existsSync(logDir)) {
				fs.mkdirSync(logDir, {recursive: true, mode: 0o700});
			}
			if (!fs.existsSync(this.logFile)) {
				fs.writeFileSync(this.logFile, '', 'utf8');
			}
		} catch (_error) {
			// logging is unavailable; commands still run
		}
	}

	/**
	 * Shift settings-switch.log -> .1 -> .2 ... once the size limit is reached
	 */
	private rotateLogIfNeeded(): void {
		try {
			const stats = fs.statSync(this.logFile);
			if (stats.size < this.config.maxSizeBytes) {
				return;
			}

			const oldestLog = `${this.logFile}.${this.config.maxRotatedFiles}`;
			if (fs.existsSync(oldestLog)) {
				fs.unlinkSync(oldestLog);
			}

			for (let i = this.config.maxRotatedFiles; i > 0; i--) {
				const oldName = i === 1 ? this.logFile : `${this.logFile}.${i - 1}`;
				if (fs.existsSync(oldName)) {
					fs.renameSync(oldName, `${this.logFile}.${i}`);
				}
			}

			fs.writeFileSync(this.logFile, '', 'utf8');
		} catch (_error) {
			// keep appending to the current file
		}
	}

	private queueWrite(callback: () => void): void {
		this.writeQueue.push(callback);
		this.processQueue();
	}

	private processQueue(): void {
		if (this.isWriting || this.writeQueue.length === 0) {
			return;
		}

		this.isWriting = true;
		const callback = this.writeQueue.shift();

		try {
			callback?.();
		} finally {
			this.isWriting = false;
			this.processQueue();
		}
	}

	private writeLog(level: LogLevel, args: unknown[]): void {
		this.queueWrite(() => {
			try {
				this.rotateLogIfNeeded();

				const timestamp = new Date().toISOString();
				const logLine = `[${timestamp}] [${level}] ${format(...args)}\n`;
				fs.appendFileSync(this.logFile, logLine, 'utf8');
			} catch (_error) {
				// dropped line
			}

			if (level === LogLevel.ERROR && this.config.logErrorsToConsole) {
				console.error(`[${level}]`, ...args);
			}
		});
	}

	public getLogPath(): string {
		return this.logFile;
	}

	public log(...args: unknown[]): void {
		this.writeLog(LogLevel.LOG, args);
	}

	public info(...args: unknown[]): void {
		this.writeLog(LogLevel.INFO, args);
	}

	public warn(...args: unknown[]): void {
		this.writeLog(LogLevel.WARN, args);
	}

	public error(...args: unknown[]): void {
		this.writeLog(LogLevel.ERROR, args);
	}

	/**
	 * Detailed diagnostics, file only
	 */
	public debug(...args: unknown[]): void {
		this.writeLog(LogLevel.DEBUG, args);
	}
}

export const logger = new Logger();
