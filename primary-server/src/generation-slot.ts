import { toGenerationError, type GenerationError } from '../../shared/lib/errors.js';

/**
 * Single-slot holder for the in-flight generation task.
 *
 * At most one task runs at a time; the serving loop joins it before it reads
 * the event the task writes. A failed task is reported by `join`, never as an
 * unhandled rejection.
 */
export class GenerationSlot {
  private pending: Promise<GenerationError | null> | null = null;

  constructor(private readonly onFailure: (error: GenerationError) => void = () => {}) {}

  get busy(): boolean {
    return this.pending !== null;
  }

  start(task: () => Promise<void>): void {
    if (this.pending) {
      throw new Error('A generation task is already in flight');
    }
    this.pending = task().then(
      () => null,
      (err: unknown) => {
        const failure = toGenerationError(err);
        this.onFailure(failure);
        return failure;
      },
    );
  }

  /** Wait for the in-flight task (if any) and free the slot; rethrows its failure. */
  async join(): Promise<void> {
    const failure = await this.settle();
    if (failure) throw failure;
  }

  /** Like join, but hands the failure back instead of throwing it. */
  async settle(): Promise<GenerationError | null> {
    const pending = this.pending;
    if (!pending) return null;
    const failure = await pending;
    if (this.pending === pending) this.pending = null;
    return failure;
  }
}
