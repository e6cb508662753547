import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	level: string;
	// Rotated files are written here when `files` is on
	logDir: string;
	console?: boolean;
	files?: boolean;
}

function lineFormat(serviceName: string) {
	return winston.format.printf(info => {
		const stack = typeof info.stack === "string" ? `\n${info.stack}` : "";
		return `${String(info.timestamp)} [${serviceName}] ${info.level}: ${String(info.message)}${stack}`;
	});
}

/**
 * Console plus two rotated files: everything at `level`, and errors only.
 * With both outputs off the logger is silent.
 */
export function createLogger(opts: LoggerOptions): winston.Logger {
	const base = winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
		winston.format.errors({ stack: true }),
		winston.format.splat()
	);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		const formats = process.stdout.isTTY ? [winston.format.colorize(), lineFormat(opts.serviceName)] : [lineFormat(opts.serviceName)];
		transports.push(new winston.transports.Console({ format: winston.format.combine(...formats) }));
	}

	if (opts.files ?? true) {
		fs.mkdirSync(opts.logDir, { recursive: true });

		const rotated = (name: string, maxFiles: string, level?: string) =>
			new DailyRotateFile({
				level,
				dirname: opts.logDir,
				filename: `${name}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles,
				format: lineFormat(opts.serviceName)
			});

		transports.push(rotated(opts.serviceName, "14d"));
		transports.push(rotated(`${opts.serviceName}.error`, "30d", "error"));
	}

	return winston.createLogger({
		level: opts.level,
		format: base,
		transports,
		silent: transports.length === 0
	});
}
