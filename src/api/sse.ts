// ═══════════════════════════════════════════════════════════════════════════════
// SSE WRITER — Server-Sent Events over an Express Response
// ═══════════════════════════════════════════════════════════════════════════════

import type { Response } from 'express';

export class SseWriter {
  private initialized = false;
  private closed = false;

  constructor(private readonly res: Response) {
    res.on('close', () => {
      this.closed = true;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  init(): void {
    if (this.initialized) return;

    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.setHeader('X-Accel-Buffering', 'no');
    this.res.flushHeaders();

    this.initialized = true;
  }

  /**
   * One `data:` frame per payload. Returns false once the client is gone.
   */
  send(payload: object): boolean {
    if (this.closed) return false;
    if (!this.initialized) this.init();

    this.res.write(`data: ${JSON.stringify(payload)}\n\n`);
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.res.end();
  }
}
