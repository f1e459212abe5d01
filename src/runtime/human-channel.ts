/**
 * Request/response handoff between a front-end and the thought loop.
 *
 * A front-end posts text with request() and awaits the reply; only the
 * loop takes requests off the queue and answers them. If the loop does
 * not answer within the timeout the caller gets NO_RESPONSE and a late
 * answer is dropped.
 */

export const NO_RESPONSE = "(no response)";
export const DEFAULT_REPLY_TIMEOUT_MS = 180_000;

export interface HumanRequest {
  readonly text: string;
  readonly postedAt: Date;
  respond(reply: string): void;
}

export class HumanChannel {
  private readonly queue: HumanRequest[] = [];

  /** @param onPost called after each post, so the loop can cut its wait short */
  constructor(private readonly onPost: () => void = () => {}) {}

  get pending(): number {
    return this.queue.length;
  }

  request(text: string, timeoutMs: number = DEFAULT_REPLY_TIMEOUT_MS): Promise<string> {
    return new Promise<string>((resolve) => {
      let answered = false;
      const finish = (reply: string) => {
        if (answered) return;
        answered = true;
        clearTimeout(timer);
        resolve(reply);
      };
      const timer = setTimeout(() => finish(NO_RESPONSE), timeoutMs);
      this.queue.push({ text, postedAt: new Date(), respond: finish });
      this.onPost();
    });
  }

  take(): HumanRequest | undefined {
    return this.queue.shift();
  }

  /** Answer everything still queued, e.g. when the loop stops. */
  drain(reply: string = NO_RESPONSE): void {
    for (const req of this.queue.splice(0)) req.respond(reply);
  }
}
