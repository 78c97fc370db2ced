import type pino from 'pino';

/** Receives human-readable progress and error lines. Nothing depends on the result. */
interface StatusSink {
  notify(message: string): void;
}

function createLoggerStatusSink(log: pino.Logger): StatusSink {
  return {
    notify(message: string) {
      log.info(message);
    },
  };
}

/** Keeps the most recent messages in memory so pollers can read them back. */
class BufferedStatusSink implements StatusSink {
  private readonly messages: string[] = [];
  private readonly capacity: number;
  private readonly forward: StatusSink | null;

  constructor(options: { capacity?: number; forward?: StatusSink | null } = {}) {
    this.capacity = Math.max(1, options.capacity ?? 200);
    this.forward = options.forward ?? null;
  }

  notify(message: string): void {
    this.messages.push(message);
    if (this.messages.length > this.capacity) {
      this.messages.splice(0, this.messages.length - this.capacity);
    }
    this.forward?.notify(message);
  }

  recent(limit = this.capacity): string[] {
    if (limit <= 0) return [];
    return this.messages.slice(-limit);
  }

  get last(): string | null {
    return this.messages.length > 0 ? this.messages[this.messages.length - 1] : null;
  }
}

export { BufferedStatusSink, createLoggerStatusSink };
export type { StatusSink };
