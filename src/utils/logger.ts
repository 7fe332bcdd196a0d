// src/utils/logger.ts
import * as fs from 'fs';
import * as path from 'path';
import winston, { Logform } from 'winston';
import Transport from 'winston-transport';
import type { LogLevel } from '../types';

// --- Custom levels and colors ---
const customLevels = {
	levels: {
		none: -1,
		error: 0,
		warn: 1,
		success: 2,
		info: 3,
		debug: 4,
	},
	colors: {
		error: 'red',
		warn: 'yellow',
		success: 'green',
		info: 'magenta',
		debug: 'cyan',
		none: 'grey',
	},
};

winston.addColors(customLevels.colors);

let currentLogLevel: LogLevel = 'info';
let isFileLoggingEnabled = false;
let allLogFile: string | undefined;
let errorLogFile: string | undefined;

const fileLogFormat = winston.format.combine(
	winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
	winston.format.errors({ stack: true }),
	winston.format.splat(),
	winston.format.printf((info: Logform.TransformableInfo) => {
		const stackInfo = info.stack ? `\n${String(info.stack)}` : '';
		const level = info.level.toUpperCase().padEnd(7);
		return `[${String(info.timestamp)}] [${level}] - ${String(info.message)}${stackInfo}`;
	})
);

const MAX_LEVEL_LENGTH = 7;
const levelAlign = winston.format((info) => {
	const level = info.level.toUpperCase();
	const padding = MAX_LEVEL_LENGTH - level.length;
	if (padding > 0) {
		const padStart = Math.floor(padding / 2);
		const padEnd = padding - padStart;
		info.level = ' '.repeat(padStart) + level + ' '.repeat(padEnd);
	} else {
		info.level = level;
	}
	return info;
});

const consoleLogFormat = winston.format.combine(
	winston.format.timestamp({ format: 'HH:mm:ss' }),
	levelAlign(),
	winston.format.colorize(),
	winston.format.printf((info: Logform.TransformableInfo) => {
		return `[${String(info.timestamp)}] [${info.level}] - ${String(info.message)}`;
	})
);

// Keeps warnings and errors for the summary printed at exit
const memoryTransportBuffer: Logform.TransformableInfo[] = [];
class MemoryTransport extends Transport {
	log(info: Logform.TransformableInfo, callback: () => void) {
		setImmediate(() => { this.emit('logged', info); });
		if (info.level === 'error' || info.level === 'warn') {
			memoryTransportBuffer.push(info);
		}
		callback();
	}
}

const logger = winston.createLogger({
	level: currentLogLevel,
	levels: customLevels.levels,
	format: fileLogFormat,
	transports: [
		new winston.transports.Console({
			format: consoleLogFormat,
			level: currentLogLevel,
		}),
		new MemoryTransport({ level: 'warn' }),
	],
	exitOnError: false,
});

/**
 * Adds (or silences) the `<baseName>.all.log` / `<baseName>.error.log` file transports.
 * The transports are created on first enable so that importing the logger never touches the disk.
 */
const setFileLogging = (enabled: boolean, logDir?: string, baseName = 'benchmark'): void => {
	isFileLoggingEnabled = enabled;

	if (enabled && logDir && !allLogFile) {
		fs.mkdirSync(logDir, { recursive: true });
		allLogFile = path.join(logDir, `${baseName}.all.log`);
		errorLogFile = path.join(logDir, `${baseName}.error.log`);
		logger.add(new winston.transports.File({ filename: allLogFile, level: 'debug', options: { flags: 'w' } }));
		logger.add(new winston.transports.File({ filename: errorLogFile, level: 'warn', options: { flags: 'w' } }));
	}

	if (currentLogLevel === 'none') {
		return;
	}
	logger.transports.forEach(transport => {
		if (transport instanceof winston.transports.File) {
			transport.silent = !enabled;
		}
	});
	logger.debug(`File logging ${enabled ? 'enabled' : 'disabled'}${allLogFile ? ` (${allLogFile})` : ''}.`);
};

const isKnownLevel = (level: string): level is LogLevel => level in customLevels.levels;

const setLogLevel = (newLevel: string): void => {
	if (newLevel === 'none') {
		currentLogLevel = 'none';
		logger.transports.forEach(transport => {
			transport.silent = true;
		});
		logger.level = 'none';
		return;
	}

	if (!isKnownLevel(newLevel)) {
		logger.warn(`Unknown log level "${newLevel}", using "info".`);
		currentLogLevel = 'info';
	} else {
		currentLogLevel = newLevel;
	}

	logger.level = currentLogLevel;

	logger.transports.forEach(transport => {
		if (transport instanceof winston.transports.File) {
			transport.silent = !isFileLoggingEnabled;
		} else if (transport instanceof winston.transports.Console) {
			transport.silent = false;
			transport.level = currentLogLevel;
		} else {
			transport.silent = false;
		}
	});

	logger.debug(`Log level set to "${currentLogLevel}".`);
};

const flushErrorLogs = async (): Promise<void> => {
	if (currentLogLevel === 'none') {
		return;
	}
	if (memoryTransportBuffer.length > 0) {
		console.error(`\n--- Errors/warnings (${memoryTransportBuffer.length}) ---`);
		memoryTransportBuffer.forEach(info => {
			console.error(`[${info.level.toUpperCase()}] ${String(info.message)}${info.stack ? '\n' + String(info.stack) : ''}`);
		});
	}
	if (allLogFile) {
		console.error(`--- Full log: ${allLogFile} ---`);
		console.error(`--- Errors/warnings: ${errorLogFile ?? 'N/A'} ---`);
	}
};

const log = {
	error: (message: string, error?: unknown, ...meta: unknown[]) => {
		if (error instanceof Error) {
			logger.error(message, { stack: error.stack, ...meta });
		} else if (error !== undefined) {
			logger.error(message, error, ...meta);
		} else {
			logger.error(message, ...meta);
		}
	},
	warn: (message: string, ...meta: unknown[]) => logger.warn(message, ...meta),
	success: (message: string, ...meta: unknown[]) => logger.log('success', message, ...meta),
	info: (message: string, ...meta: unknown[]) => logger.info(message, ...meta),
	debug: (message: string, ...meta: unknown[]) => logger.debug(message, ...meta),
	step: (message: string) => logger.info(`--- STEP: ${message} ---`),
	setLogLevel,
	setFileLogging,
	flushErrorLogs,
};

export { log };
