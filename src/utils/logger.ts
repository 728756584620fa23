type LogLevel = "info" | "warn" | "error";

function write(level: LogLevel, message: string, meta?: object): void {
	const line = JSON.stringify({
		level,
		message,
		...meta,
		timestamp: Date.now(),
	});
	if (level === "error") {
		console.error(line);
	} else if (level === "warn") {
		console.warn(line);
	} else {
		console.log(line);
	}
}

export const logger = {
	info: (msg: string, meta?: object) => {
		write("info", msg, meta);
	},
	warn: (msg: string, meta?: object) => {
		write("warn", msg, meta);
	},
	error: (msg: string, error?: unknown, meta?: object) => {
		write("error", msg, {
			...meta,
			error: error instanceof Error ? error.message : String(error),
			errorName: error instanceof Error ? error.name : undefined,
		});
	},
};
