import type { StepEvent } from '../types';
import { STEP_DELAY_MS } from '../core/const';
import type { PathfinderSession } from './session';

export type FrameCallback = (event: StepEvent | undefined) => void;

/**
 * Paces a visual search: pulls one step from the session per timer tick and
 * hands it to the renderer. The engine itself has no notion of time.
 */
export class SearchAnimator {
  private timer: ReturnType<typeof setTimeout> | undefined;

  public constructor(
    private readonly session: PathfinderSession,
    private readonly onFrame: FrameCallback,
    private readonly delayMs: number = STEP_DELAY_MS
  ) {}

  public get running(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Schedules steps until the session's search finishes. No-op if already running.
   */
  public start(): void {
    if (this.timer !== undefined || !this.session.isSearching) {
      return;
    }
    this.schedule();
  }

  /**
   * Stops pulling steps. The run stays where it is.
   */
  public stop(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => this.tick(), this.delayMs);
  }

  private tick(): void {
    this.timer = undefined;
    const ev: StepEvent | undefined = this.session.advance();
    this.onFrame(ev);
    if (this.session.isSearching) {
      this.schedule();
    }
  }
}
