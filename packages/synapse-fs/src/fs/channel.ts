import { SynapseFsError } from '@/errors';

/** Returned by `read` once the source is exhausted. Distinct from a zero-byte read. */
export const EOF = -1;

export interface SeekableByteChannel {
  read(dst: Uint8Array): Promise<number>;
  write(src: Uint8Array): Promise<number>;
  position(): Promise<number>;
  setPosition(newPosition: number): Promise<this>;
  size(): Promise<number>;
  truncate(size: number): Promise<this>;
  isOpen(): boolean;
  close(): Promise<void>;
}

export const closedChannel = (): SynapseFsError => new SynapseFsError('Channel is closed', 'CHANNEL_CLOSED');

export const assertPosition = (value: number, label: string): void => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new SynapseFsError(`${label} must be a non-negative integer, got ${value}`, 'INVALID_ARGUMENT');
  }
};
