import { EventEmitter } from 'events';
import WebSocket = require('ws');
import { Logger, silentLogger } from '../../common/logger';

/**
 * Shared plumbing for the socket-backed transports: an error queue and a
 * step that waits for inbound activity
 */
export abstract class SocketTransport extends EventEmitter {
  protected readonly logger: Logger;
  private errors: Error[] = [];

  constructor(logger: Logger = silentLogger) {
    super();
    this.logger = logger;
  }

  protected abstract hasPendingInbound(): boolean;

  /**
   * Suspend until something arrives or `maxDurationMs` passes
   */
  step(maxDurationMs: number): Promise<void> {
    if (this.errors.length > 0 || this.hasPendingInbound()) {
      return new Promise(resolve => setImmediate(resolve));
    }

    return new Promise(resolve => {
      const onActivity = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.off('activity', onActivity);
        resolve();
      }, Math.max(0, maxDurationMs));
      this.once('activity', onActivity);
    });
  }

  drainErrors(): Error[] {
    const errors = this.errors;
    this.errors = [];
    return errors;
  }

  reportError(error: Error): void {
    this.errors.push(error);
    this.notifyActivity();
  }

  protected notifyActivity(): void {
    this.emit('activity');
  }
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
