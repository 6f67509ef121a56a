/**
 * Single-slot operator message shown on the status line.
 *
 * @module control/status_board
 */

/** How long a status message stays visible. */
export const DEFAULT_STATUS_TTL_MS = 8000;

export interface StatusMessage {
  text: string;
  posted_at_ms: number;
}

export class StatusBoard {
  private message: StatusMessage | null = null;

  constructor(
    private readonly now_ms: () => number,
    private readonly ttl_ms: number = DEFAULT_STATUS_TTL_MS
  ) {}

  /** Replace the current message. */
  post(text: string): void {
    this.message = { text, posted_at_ms: this.now_ms() };
  }

  /** Last message, visible or not. */
  latest(): StatusMessage | null {
    return this.message;
  }

  /** Text to display at `now_ms`, or null once the message has expired. */
  visible_text(now_ms: number): string | null {
    if (!this.message || this.message.text === '') {
      return null;
    }
    return now_ms - this.message.posted_at_ms < this.ttl_ms ? this.message.text : null;
  }
}
