/**
 * FrameSource - Live video device abstraction
 *
 * The engine never touches a camera API directly. A host supplies a
 * FrameSource (a browser MediaStream wrapper, a V4L2 bridge, a test fake)
 * and the engine drives it through acquire → captureFrame* → release.
 *
 * @module capture/FrameSource
 */

import { DeviceUnavailableError } from '$lib/session/errors';

/**
 * An encoded still image pulled from the device
 */
export interface RawImage {
	/** Encoded bytes (JPEG or PNG) */
	data: Uint8Array;
	/** e.g. image/jpeg */
	mimeType: string;
	width: number;
	height: number;
}

/**
 * Device collaborator contract
 *
 * @typeParam H - Opaque handle type returned by `acquire`
 */
export interface FrameSource<H = unknown> {
	/**
	 * Open the device
	 *
	 * @throws DeviceUnavailableError (or any error, which is wrapped as one)
	 */
	acquire(sourceId: string): Promise<H>;
	/** Grab the current frame. Throwing here means the device failed. */
	captureFrame(handle: H): Promise<RawImage>;
	release(handle: H): Promise<void> | void;
}

/**
 * ExclusiveFrameSource - Leases each device to at most one session
 *
 * Wraps another FrameSource and refuses a second `acquire` for a source id
 * that is already leased (or still being acquired). Leases are keyed by
 * source id, so inner handles may be primitives such as file descriptors.
 *
 * @example
 * ```typescript
 * const cameras = new ExclusiveFrameSource(usbCameraSource);
 * const a = await cameras.acquire('cam-1');
 * await cameras.acquire('cam-1'); // throws DeviceUnavailableError
 * await cameras.release(a);
 * ```
 */
export class ExclusiveFrameSource<H> implements FrameSource<H> {
	private readonly inner: FrameSource<H>;
	private readonly pending = new Set<string>();
	private readonly leases = new Map<string, H>();

	constructor(inner: FrameSource<H>) {
		this.inner = inner;
	}

	/** Number of devices currently leased */
	get leaseCount(): number {
		return this.leases.size;
	}

	isLeased(sourceId: string): boolean {
		return this.pending.has(sourceId) || this.leases.has(sourceId);
	}

	private leaseOf(handle: H): string | undefined {
		for (const [sourceId, leased] of this.leases) {
			if (leased === handle) return sourceId;
		}
		return undefined;
	}

	async acquire(sourceId: string): Promise<H> {
		if (this.isLeased(sourceId)) {
			throw new DeviceUnavailableError(
				sourceId,
				`Capture device "${sourceId}" is already in use by another session`
			);
		}

		this.pending.add(sourceId);
		try {
			const handle = await this.inner.acquire(sourceId);
			this.leases.set(sourceId, handle);
			console.log(`[ExclusiveFrameSource] Leased "${sourceId}"`);
			return handle;
		} finally {
			this.pending.delete(sourceId);
		}
	}

	async captureFrame(handle: H): Promise<RawImage> {
		if (this.leaseOf(handle) === undefined) {
			throw new DeviceUnavailableError('unknown', 'Capture attempted on a handle that is not leased');
		}
		return this.inner.captureFrame(handle);
	}

	async release(handle: H): Promise<void> {
		const sourceId = this.leaseOf(handle);
		if (sourceId === undefined) return;

		this.leases.delete(sourceId);
		await this.inner.release(handle);
		console.log(`[ExclusiveFrameSource] Released "${sourceId}"`);
	}
}
