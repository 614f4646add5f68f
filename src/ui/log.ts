import type { Message } from '../types';
import { MessageLevel } from '../types/enums';

/**
 * Fixed-size message log for UI display.
 */
export class MessageLog {
  private readonly max: number;
  private readonly items: Message[];

  /**
   * Creates a new message log with a max capacity.
   * @param max The maximum number of messages.
   * @param now Clock used to stamp messages.
   */
  public constructor(max: number, private readonly now: () => number = Date.now) {
    this.max = Math.max(1, max);
    this.items = [];
  }

  /**
   * Adds a message to the log, dropping the oldest past capacity.
   * @param text The message text.
   * @param level The message severity.
   */
  public push(text: string, level: MessageLevel = MessageLevel.Info): void {
    this.items.unshift({ text, level, t: this.now() });
    while (this.items.length > this.max) this.items.pop();
  }

  public warn(text: string): void {
    this.push(text, MessageLevel.Warn);
  }

  public latest(): Message | undefined {
    return this.items[0];
  }

  /**
   * Returns all messages, newest first.
   * @returns The message list.
   */
  public all(): Message[] {
    return [...this.items];
  }

  public clear(): void {
    this.items.length = 0;
  }
}
