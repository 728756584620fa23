import { z } from "zod";

const EnvSchema = z.object({
	PORT: z.coerce.number().int().positive().optional(),
	HOST: z.string().min(1).optional(),
	ISA_STORAGE: z.enum(["postgres", "memory"]).optional(),
	ISA_POLICY_FILE: z.string().min(1).optional(),
	ISA_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().optional(),
	PGHOST: z.string().min(1).optional(),
	PGPORT: z.coerce.number().int().positive().optional(),
	PGDATABASE: z.string().min(1).optional(),
	PGUSER: z.string().min(1).optional(),
	PGPASSWORD: z.string().optional(),
});

const env = EnvSchema.parse(process.env);

export const settings = {
	server: {
		port: env.PORT ?? 3000,
		host: env.HOST ?? "0.0.0.0",
	},
	storage: {
		driver: env.ISA_STORAGE ?? "postgres",
	},
	policy: {
		file: env.ISA_POLICY_FILE ?? null,
	},
	sweeper: {
		intervalMs: env.ISA_SWEEP_INTERVAL_MS ?? 15 * 60 * 1000,
	},
	postgres: {
		host: env.PGHOST ?? "localhost",
		port: env.PGPORT ?? 5432,
		database: env.PGDATABASE ?? "isa_enforcement",
		user: env.PGUSER ?? "isa",
		password: env.PGPASSWORD ?? "isa",
	},
} as const;

export type Settings = typeof settings;
