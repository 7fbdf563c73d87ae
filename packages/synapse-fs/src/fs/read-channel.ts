import { SynapseFsError, unsupported } from '@/errors';
import { getLogger } from '@/telemetry/logger';
import { EOF, assertPosition, closedChannel, type SeekableByteChannel } from './channel';

interface ChunkSource {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
}

export interface ReadChannelOptions {
  timeoutMs: number;
}

const logger = () => getLogger('ReadChannel');

const EMPTY = new Uint8Array(0);

const emptySource: ChunkSource = {
  read: async () => ({ done: true }),
  cancel: async () => undefined,
};

/**
 * Forward-only channel over a single streaming GET of a presigned URL. The request is
 * sent on the first `read` or `position` call.
 */
export class ReadChannel implements SeekableByteChannel {
  private opening: Promise<ChunkSource> | null = null;

  private open = true;

  private exhausted = false;

  private current: Uint8Array = EMPTY;

  private offset = 0;

  private bytesRead = 0;

  constructor(
    private readonly presignedUrl: string,
    private readonly contentSize: number,
    private readonly options: ReadChannelOptions
  ) {}

  private connect(): Promise<ChunkSource> {
    if (!this.open) {
      return Promise.reject(closedChannel());
    }
    if (!this.opening) {
      this.opening = this.fetchBody();
    }
    return this.opening;
  }

  private async fetchBody(): Promise<ChunkSource> {
    // The timeout bounds the wait for response headers only; the body may stream for longer
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    try {
      response = await fetch(this.presignedUrl, {
        method: 'GET',
        signal: controller.signal,
      });
    } catch (error) {
      throw new SynapseFsError('Download request failed', 'REQUEST_FAILED', { cause: error });
    } finally {
      clearTimeout(timer);
    }

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new SynapseFsError(`Failed to download file: HTTP ${response.status}`, 'REQUEST_FAILED', {
        status: response.status,
      });
    }

    logger().debug({ size: this.contentSize }, 'Download stream opened');
    return response.body ? response.body.getReader() : emptySource;
  }

  private async nextChunk(source: ChunkSource): Promise<boolean> {
    while (!this.exhausted) {
      let result: Awaited<ReturnType<ChunkSource['read']>>;
      try {
        result = await source.read();
      } catch (error) {
        throw new SynapseFsError('Download stream failed', 'REQUEST_FAILED', { cause: error });
      }
      const { done, value } = result;
      if (done) {
        this.exhausted = true;
        break;
      }
      if (value && value.length > 0) {
        this.current = value;
        this.offset = 0;
        return true;
      }
    }
    return false;
  }

  async read(dst: Uint8Array): Promise<number> {
    const source = await this.connect();
    if (dst.length === 0) {
      return 0;
    }

    let filled = 0;
    while (filled < dst.length) {
      if (this.offset >= this.current.length && !(await this.nextChunk(source))) {
        break;
      }
      const count = Math.min(dst.length - filled, this.current.length - this.offset);
      dst.set(this.current.subarray(this.offset, this.offset + count), filled);
      this.offset += count;
      filled += count;
    }

    if (filled === 0) {
      return EOF;
    }
    this.bytesRead += filled;
    return filled;
  }

  async write(_src: Uint8Array): Promise<number> {
    throw unsupported('Read channel does not support write');
  }

  async position(): Promise<number> {
    await this.connect();
    return this.bytesRead;
  }

  async setPosition(newPosition: number): Promise<this> {
    if (!this.open) {
      throw closedChannel();
    }
    assertPosition(newPosition, 'Position');
    if (newPosition !== this.bytesRead) {
      throw new SynapseFsError(
        `Read channel only supports sequential reads (at ${this.bytesRead}, requested ${newPosition})`,
        'UNSUPPORTED_SEEK'
      );
    }
    return this;
  }

  /** Size reported by entity metadata; -1 when unknown. */
  async size(): Promise<number> {
    if (!this.open) {
      throw closedChannel();
    }
    return this.contentSize;
  }

  async truncate(_size: number): Promise<this> {
    throw unsupported('Read channel does not support truncate');
  }

  isOpen(): boolean {
    return this.open;
  }

  async close(): Promise<void> {
    if (!this.open) {
      return;
    }
    this.open = false;

    const opening = this.opening;
    this.opening = null;
    this.current = EMPTY;
    if (!opening) {
      return;
    }

    try {
      const source = await opening;
      await source.cancel();
    } catch (error) {
      logger().debug({ err: error }, 'Error while closing download stream');
    }
  }
}
