/**
 * Configuration Management
 *
 * Reads the optional .env file and process environment into a validated
 * DriverCheckConfig. Timeouts are not environment-driven; they can only be
 * overridden programmatically.
 */

import { homedir } from 'os';
import { join } from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import { ConfigError, describeError, getErrorCode } from './errors/DriverErrors.js';
import {
	BROWSER_USER_AGENT,
	DEFAULT_ELEVATION_COMMAND,
	DEFAULT_SMI_COMMAND,
	DETECTION_TIMEOUT_MS,
	DOWNLOAD_TIMEOUT_MS,
	INSTALL_TIMEOUT_MS,
	NVIDIA_DOWNLOAD_BASE,
	NVIDIA_LATEST_URL,
	NVIDIA_MANUAL_DOWNLOAD_URL,
	VERSION_RESOLUTION_TIMEOUT_MS,
} from '../constants/driver-constants.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface Timeouts {
	detectionMs: number;
	versionResolutionMs: number;
	downloadMs: number;
	installMs: number;
}

export interface DriverCheckConfig {
	latestVersionUrl: string;
	downloadBaseUrl: string;
	manualDownloadUrl: string;
	userAgent: string;

	/** Prefix used for the privileged install (sudo, doas, pkexec) */
	elevationCommand: string;

	/** Diagnostic binary, normally nvidia-smi */
	smiCommand: string;

	logDir: string;
	logLevel: LogLevelName;
	timeouts: Timeouts;
}

export const DEFAULT_TIMEOUTS: Timeouts = {
	detectionMs: DETECTION_TIMEOUT_MS,
	versionResolutionMs: VERSION_RESOLUTION_TIMEOUT_MS,
	downloadMs: DOWNLOAD_TIMEOUT_MS,
	installMs: INSTALL_TIMEOUT_MS,
};

export function defaultLogDir(): string {
	return join(homedir(), '.cache', 'nvidia-driver-check', 'logs');
}

// ============================================================================
// Environment Schema
// ============================================================================

const envSchema = z.object({
	NVIDIA_LATEST_URL: z.string().url().default(NVIDIA_LATEST_URL),
	NVIDIA_DOWNLOAD_BASE: z.string().url().default(NVIDIA_DOWNLOAD_BASE),
	NVIDIA_MANUAL_DOWNLOAD_URL: z.string().url().default(NVIDIA_MANUAL_DOWNLOAD_URL),
	DRIVER_CHECK_USER_AGENT: z.string().min(1).default(BROWSER_USER_AGENT),
	DRIVER_CHECK_ELEVATION_COMMAND: z
		.string()
		.regex(/^\S+$/, 'must be a single command without arguments')
		.default(DEFAULT_ELEVATION_COMMAND),
	DRIVER_CHECK_SMI_COMMAND: z
		.string()
		.regex(/^\S+$/, 'must be a single command without arguments')
		.default(DEFAULT_SMI_COMMAND),
	DRIVER_CHECK_LOG_DIR: z.string().min(1).optional(),
	LOG_LEVEL: z
		.string()
		.transform((level) => level.toLowerCase())
		.pipe(z.enum(['debug', 'info', 'warn', 'error']))
		.default('info'),
});

// ============================================================================
// Loading
// ============================================================================

/**
 * Load variables from a .env file into process.env. A missing file is not an
 * error; an unreadable or malformed one is.
 *
 * @param envPath - Path to the .env file (default: .env in the working directory)
 */
export function loadEnvFile(envPath?: string): Result<void, ConfigError> {
	try {
		const result = loadDotenv({ path: envPath });
		if (result.error && getErrorCode(result.error) !== 'ENOENT') {
			return err(new ConfigError('.env', describeError(result.error)));
		}
		return ok(undefined);
	} catch (error) {
		return err(new ConfigError('.env', describeError(error)));
	}
}

/**
 * Build the runtime configuration from environment variables
 *
 * @param env - Variables to read (default: process.env)
 * @param timeouts - Per-step timeout overrides
 */
export function loadConfig(
	env: NodeJS.ProcessEnv = process.env,
	timeouts: Partial<Timeouts> = {}
): Result<DriverCheckConfig, ConfigError> {
	const parsed = envSchema.safeParse(env);

	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue ? issue.path.join('.') : 'environment';
		return err(new ConfigError(field, issue?.message ?? 'invalid value'));
	}

	const vars = parsed.data;

	return ok({
		latestVersionUrl: vars.NVIDIA_LATEST_URL,
		downloadBaseUrl: vars.NVIDIA_DOWNLOAD_BASE,
		manualDownloadUrl: vars.NVIDIA_MANUAL_DOWNLOAD_URL,
		userAgent: vars.DRIVER_CHECK_USER_AGENT,
		elevationCommand: vars.DRIVER_CHECK_ELEVATION_COMMAND,
		smiCommand: vars.DRIVER_CHECK_SMI_COMMAND,
		logDir: vars.DRIVER_CHECK_LOG_DIR ?? defaultLogDir(),
		logLevel: vars.LOG_LEVEL,
		timeouts: { ...DEFAULT_TIMEOUTS, ...timeouts },
	});
}
