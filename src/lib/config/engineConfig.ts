/**
 * Engine configuration
 *
 * Defaults plus validation for the settings a session initiator controls,
 * and environment loading for the detection service client.
 *
 * @module config/engineConfig
 */

import { InvalidConfigurationError } from '$lib/session/errors';
import type { SessionConfig } from '$lib/session/types';

/**
 * Default session configuration
 */
export const DEFAULT_SESSION_CONFIG: SessionConfig = {
	captureIntervalMs: 1000,
	sourceId: 'default',
	autoCapture: true
};

/**
 * Detection service client configuration
 */
export interface AnalysisClientConfig {
	/** Base URL of the detection service */
	baseUrl: string;
	/** Transport-level timeout in milliseconds */
	timeoutMs: number;
	/** Value sent as the `source` form field */
	source: string;
}

export const DEFAULT_ANALYSIS_CLIENT_CONFIG: AnalysisClientConfig = {
	baseUrl: 'http://localhost:5001',
	timeoutMs: 30000,
	source: 'realtime_analysis'
};

/**
 * Check a capture interval
 *
 * @throws InvalidConfigurationError unless the value is a positive integer
 */
export function assertCaptureInterval(intervalMs: number): void {
	if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
		throw new InvalidConfigurationError(
			'captureIntervalMs',
			`Capture interval must be a positive integer number of milliseconds, got ${intervalMs}`
		);
	}
}

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws InvalidConfigurationError on the first invalid field
 */
export function resolveSessionConfig(config: Partial<SessionConfig> = {}): SessionConfig {
	const merged: SessionConfig = { ...DEFAULT_SESSION_CONFIG, ...config };

	assertCaptureInterval(merged.captureIntervalMs);

	if (typeof merged.sourceId !== 'string' || merged.sourceId.trim() === '') {
		throw new InvalidConfigurationError('sourceId', 'Source identifier must be a non-empty string');
	}

	if (typeof merged.autoCapture !== 'boolean') {
		throw new InvalidConfigurationError('autoCapture', 'autoCapture must be a boolean');
	}

	return merged;
}

/**
 * Read the detection service settings from the environment
 *
 * - ANALYSIS_API_URL: base URL (default http://localhost:5001)
 * - ANALYSIS_TIMEOUT_MS: positive integer timeout
 */
export function loadAnalysisClientConfig(
	env: Record<string, string | undefined> = process.env
): AnalysisClientConfig {
	const config = { ...DEFAULT_ANALYSIS_CLIENT_CONFIG };

	const baseUrl = env.ANALYSIS_API_URL?.trim();
	if (baseUrl) {
		config.baseUrl = baseUrl.replace(/\/+$/, '');
	}

	const rawTimeout = env.ANALYSIS_TIMEOUT_MS?.trim();
	if (rawTimeout) {
		const timeoutMs = Number(rawTimeout);
		if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
			throw new InvalidConfigurationError(
				'ANALYSIS_TIMEOUT_MS',
				`ANALYSIS_TIMEOUT_MS must be a positive integer, got "${rawTimeout}"`
			);
		}
		config.timeoutMs = timeoutMs;
	}

	return config;
}
