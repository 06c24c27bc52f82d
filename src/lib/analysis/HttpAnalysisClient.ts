/**
 * HttpAnalysisClient - Detection service client over HTTP
 *
 * Posts each frame as multipart form data to the detection service's
 * `/api/detection/frame` endpoint and maps the snake_case response onto the
 * engine's AnalysisResult.
 *
 * @module analysis/HttpAnalysisClient
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import {
	DEFAULT_ANALYSIS_CLIENT_CONFIG,
	type AnalysisClientConfig
} from '$lib/config/engineConfig';
import type { RawImage } from '$lib/capture/FrameSource';
import { AnalysisError, errorMessage } from '$lib/session/errors';
import { parseDetectionResponse, type AnalysisResult } from './AnalysisResultSchema';
import type { AnalysisCollaborator, AnalyzeOptions } from './SubmissionPipeline';

export const FRAME_ENDPOINT = '/api/detection/frame';
export const HEALTH_ENDPOINT = '/api/health';

export interface HttpAnalysisClientOptions {
	/** Replace the transport, e.g. with an in-process stand-in */
	adapter?: AxiosAdapter;
}

const EXTENSIONS: Record<string, string> = {
	'image/jpeg': 'jpg',
	'image/jpg': 'jpg',
	'image/png': 'png'
};

/**
 * Turn an axios failure into an AnalysisError
 */
function toAnalysisError(error: unknown): AnalysisError {
	if (error instanceof AnalysisError) return error;

	if (axios.isAxiosError(error)) {
		if (error.response) {
			return new AnalysisError(
				'service',
				`Detection service responded with status ${error.response.status}`,
				{ cause: error }
			);
		}
		if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
			return new AnalysisError('timeout', `Detection service timed out: ${error.message}`, {
				cause: error
			});
		}
	}

	return new AnalysisError('transport', `Detection service unreachable: ${errorMessage(error)}`, {
		cause: error
	});
}

/**
 * HttpAnalysisClient - AnalysisCollaborator backed by the detection service
 *
 * @example
 * ```typescript
 * const client = new HttpAnalysisClient(loadAnalysisClientConfig());
 * if (await client.checkHealth()) {
 *   const result = await client.analyze(image, { signal });
 * }
 * ```
 */
export class HttpAnalysisClient implements AnalysisCollaborator {
	private readonly http: AxiosInstance;
	private readonly config: AnalysisClientConfig;
	private frameCounter = 0;

	constructor(config: Partial<AnalysisClientConfig> = {}, options: HttpAnalysisClientOptions = {}) {
		this.config = { ...DEFAULT_ANALYSIS_CLIENT_CONFIG, ...config };

		this.http = axios.create({
			baseURL: this.config.baseUrl,
			timeout: this.config.timeoutMs,
			maxBodyLength: Infinity,
			maxContentLength: Infinity,
			adapter: options.adapter
		});

		this.http.interceptors.response.use(
			(res) => res,
			(error: unknown) => Promise.reject(toAnalysisError(error))
		);
	}

	get baseUrl(): string {
		return this.config.baseUrl;
	}

	/**
	 * Analyze one frame
	 *
	 * @throws AnalysisError on transport failure, error status or malformed body
	 */
	async analyze(image: RawImage, options: AnalyzeOptions): Promise<AnalysisResult> {
		const extension = EXTENSIONS[image.mimeType] ?? 'jpg';
		this.frameCounter++;
		const filename = `frame_${Date.now()}_${this.frameCounter}.${extension}`;

		const form = new FormData();
		form.append('image', new Blob([image.data], { type: image.mimeType }), filename);
		form.append('filename', filename);
		form.append('source', this.config.source);

		const { data } = await this.http.post<unknown>(FRAME_ENDPOINT, form, {
			signal: options.signal
		});

		return parseDetectionResponse(data);
	}

	/**
	 * Whether the detection service reports itself healthy
	 *
	 * Accepts `{ status: 'healthy' }` or `{ status: 'ok' }`; anything else,
	 * including a failed request, is unhealthy.
	 */
	async checkHealth(): Promise<boolean> {
		try {
			const { data } = await this.http.get<unknown>(HEALTH_ENDPOINT, { timeout: 10000 });
			const status =
				typeof data === 'object' && data !== null && 'status' in data ? data.status : undefined;
			return status === 'healthy' || status === 'ok';
		} catch (err: unknown) {
			console.warn(`[HttpAnalysisClient] Health check failed: ${errorMessage(err)}`);
			return false;
		}
	}
}
