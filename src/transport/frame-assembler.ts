import { TransportFault } from '../errors';

/**
 * Accumulates message fragments until a frame boundary.
 * A frame that grows past maxFrameBytes is a transport fault; the caller drops
 * the connection.
 *
 * The ws connector hands over whole messages, so there it only guards the size.
 */
export class FrameAssembler {
	private chunks: Buffer[] = [];
	private size = 0;

	constructor(private readonly maxFrameBytes: number = 1024 * 1024) {}

	/**
	 * Add a fragment; returns the completed frame text once isFinal is seen
	 */
	push(chunk: Buffer | string, isFinal: boolean): string | undefined {
		const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;

		this.size += buffer.length;
		if (this.size > this.maxFrameBytes) {
			const size = this.size;
			this.reset();
			throw new TransportFault(`Frame exceeds ${this.maxFrameBytes} bytes (${size} received)`);
		}
		this.chunks.push(buffer);

		if (!isFinal) {
			return undefined;
		}

		const frame = Buffer.concat(this.chunks).toString('utf-8');
		this.reset();
		return frame;
	}

	reset(): void {
		this.chunks = [];
		this.size = 0;
	}
}
