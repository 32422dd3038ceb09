import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import type { LogLevel } from "./config";

export type LogEntry = {
	timestamp: string;
	level: LogLevel;
	message: string;
	source?: string;
	data?: Record<string, unknown>;
};

export interface LogSink {
	write(entry: LogEntry): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Ring buffer read by the Logs panel. */
export class MemorySink implements LogSink {
	private buffer: LogEntry[] = [];
	private readonly listeners = new Set<() => void>();

	constructor(private readonly maxSize = 200) {}

	write(entry: LogEntry): void {
		this.buffer = [...this.buffer, entry].slice(-this.maxSize);
		for (const listener of this.listeners) listener();
	}

	entries(): readonly LogEntry[] {
		return this.buffer;
	}

	subscribe(listener: () => void): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}

/** Appends one JSON object per line. */
export class FileSink implements LogSink {
	private ready = false;
	private failed = false;

	constructor(private readonly filePath: string) {}

	write(entry: LogEntry): void {
		if (this.failed) return;
		try {
			if (!this.ready) {
				mkdirSync(path.dirname(this.filePath), { recursive: true });
				this.ready = true;
			}
			appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`);
		} catch {
			// The UI owns the terminal, so there is nowhere to report this.
			this.failed = true;
		}
	}
}

export class Logger {
	constructor(
		private level: LogLevel,
		private readonly sinks: LogSink[],
		private readonly source?: string
	) {}

	child(source: string): Logger {
		return new Logger(this.level, this.sinks, source);
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	debug(message: string, data?: Record<string, unknown>): void {
		this.log("debug", message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		this.log("info", message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		this.log("warn", message, data);
	}

	error(message: string, data?: Record<string, unknown>): void {
		this.log("error", message, data);
	}

	private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
			...(this.source ? { source: this.source } : {}),
			...(data && Object.keys(data).length > 0 ? { data } : {}),
		};
		for (const sink of this.sinks) sink.write(entry);
	}
}

export function createLogger(
	options: { level: LogLevel; file?: string; workspace?: string },
	memory = new MemorySink()
): { logger: Logger; memory: MemorySink } {
	const sinks: LogSink[] = [memory];
	if (options.file) {
		sinks.push(new FileSink(path.resolve(options.workspace ?? process.cwd(), options.file)));
	}
	return { logger: new Logger(options.level, sinks), memory };
}

export const silentLogger = new Logger("error", []);

export function formatLogLine(entry: LogEntry): string {
	const time = entry.timestamp.slice(11, 19);
	const source = entry.source ? ` [${entry.source}]` : "";
	return `${time} ${entry.level.toUpperCase()}${source} ${entry.message}`;
}
